export type { Layer, SimpsonTreeOptions } from './SimpsonTree';
export { SimpsonTree, buildSimpsonTree } from './SimpsonTree';

export type { PairTuple, Ordering, SideTotals, LayerReversal, ReversalReport } from './views';
export { layerTuples, sideTotals, mergeLayer, pairOrdering, reversalReport } from './views';
