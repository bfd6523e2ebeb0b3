export { NetworkViewDto } from './network-view.dto';
export { CitationViewDto, EdgeViewDto } from './edge-view.dto';
export { UpdateVisibilityDto } from './update-visibility.dto';
