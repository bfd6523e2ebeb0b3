export { ExperimentNotFoundException } from './experiment.exceptions';
