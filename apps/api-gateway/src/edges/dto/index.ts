export { VoteEdgeDto } from './vote-edge.dto';
export { CommentEdgeDto } from './comment-edge.dto';
export { EdgeCommentDto, EdgeDetailDto, VoteTallyDto } from './edge-detail.dto';
