export {
  EmptyDocumentException,
  DocumentTooLargeException,
  MalformedDocumentException,
  ReportNotFoundException,
  ReportCreationException,
} from './report.exceptions';
