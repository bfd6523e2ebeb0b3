export {
  NetworkNotFoundException,
  NetworkForbiddenException,
  UnsupportedExportFormatException,
} from './network.exceptions';
