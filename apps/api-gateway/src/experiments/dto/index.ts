export { CreateExperimentDto } from './create-experiment.dto';
export { ExperimentViewDto } from './experiment-view.dto';
