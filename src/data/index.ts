export type { GroupCounts, PairCounts } from './realize';
export { realizeLayer, formatRealization } from './realize';
