export {
  ProjectNotFoundException,
  ProjectNameTakenException,
  MemberNotFoundException,
} from './project.exceptions';
