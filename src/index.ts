export { backward, topologicalOrder, zeroGradAll, zeroGradTree, type BackwardOptions } from './Backward';
export { DatasetError, loadMoonsData, makeMoons, parseCsv, readCsvFile, toDataset, type DataPoint, type Dataset, type MoonsOptions } from './Dataset';
export { toDot } from './GraphViz';
export { Losses } from './Losses';
export { Layer } from './nn/Layer';
export { MLP, type MLPOptions } from './nn/MLP';
export { Neuron, type NeuronOptions } from './nn/Neuron';
export { Optimizer, SGD, type OptimizerOptions } from './Optimizers';
export { gaussian, seededRandom, type Rng } from './Random';
export { computeLoss, renderDecisionBoundary, train, type LossResult, type StepResult, type TrainOptions } from './Trainer';
export { V } from './V';
export { Value, type BackwardFn } from './Value';
