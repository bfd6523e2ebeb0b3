import type { NetworkViewDto } from '../../networks';

export class ProjectMemberDto {
  id!: string;
  email!: string;
  fullName!: string;
}

export class ProjectListItemDto {
  id!: string;
  name!: string;
  description!: string | null;
  /** ISO timestamp */
  createdAt!: string;
}

export class ProjectViewDto extends ProjectListItemDto {
  members!: ProjectMemberDto[];
  networks!: NetworkViewDto[];
}

export class ProjectSummaryDto {
  id!: string;
  numberNetworks!: number;
  numberNodes!: number;
  numberEdges!: number;
}
