import { IsBoolean } from 'class-validator';

export class VoteEdgeDto {
  /** true: the curator agrees the edge is correct */
  @IsBoolean()
  agreed!: boolean;
}
