export { NetworksModule } from './networks.module';
export { NetworksService } from './networks.service';
export { NetworkAccessService } from './network-access.service';
export { toExportFile } from './export-file';
export { toCitationView, toEdgeView, toNetworkView } from './network-views';
export type { CitationViewDto, EdgeViewDto, NetworkViewDto } from './dto';
