export { CreateProjectDto } from './create-project.dto';
export { AddMemberDto } from './add-member.dto';
export {
  ProjectListItemDto,
  ProjectMemberDto,
  ProjectSummaryDto,
  ProjectViewDto,
} from './project-view.dto';
