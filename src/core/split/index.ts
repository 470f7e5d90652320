export type { SplitResult } from './splitPair';
export { splitPair } from './splitPair';
