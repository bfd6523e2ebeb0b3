export { UploadOmicDto } from './upload-omic.dto';
export { OmicDetailDto, OmicViewDto } from './omic-view.dto';
