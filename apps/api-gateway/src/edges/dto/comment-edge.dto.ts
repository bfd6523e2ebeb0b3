import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class CommentEdgeDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(5000)
  comment!: string;
}
