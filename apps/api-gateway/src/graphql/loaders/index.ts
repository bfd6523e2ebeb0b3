export { NetworkLoader } from './network.loader';
