/** Network metadata and counts; the compiled graph is served by export */
export class NetworkViewDto {
  id!: string;
  name!: string;
  version!: string;
  description!: string | null;
  authors!: string | null;
  contact!: string | null;
  license!: string | null;
  public!: boolean;
  numberNodes!: number;
  numberEdges!: number;
  ownerId!: string;
  reportId!: string;
  /** ISO timestamp */
  createdAt!: string;
}
