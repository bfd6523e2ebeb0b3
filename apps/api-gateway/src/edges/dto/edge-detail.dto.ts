import type { EdgeViewDto } from '../../networks';

export class VoteTallyDto {
  agreed!: number;
  disagreed!: number;
  /** The caller's own vote, if any */
  mine!: boolean | null;
}

export class EdgeCommentDto {
  id!: string;
  userId!: string;
  comment!: string;
  /** ISO timestamp */
  createdAt!: string;
}

export class EdgeDetailDto {
  edge!: EdgeViewDto;
  votes!: VoteTallyDto;
  comments!: EdgeCommentDto[];
}
