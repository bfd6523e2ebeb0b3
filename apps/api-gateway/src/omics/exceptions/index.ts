export {
  InvalidOmicTableException,
  OmicForbiddenException,
  OmicNotFoundException,
} from './omic.exceptions';
