export { EdgeNotFoundException } from './edge-not-found.exception';
