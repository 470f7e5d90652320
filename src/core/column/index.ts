export type { Column, SiblingPair, Role } from './Column';

export {
  DEFAULT_TOLERANCE,
  createColumn,
  createPair,
  createRootPair,
  assertRootPair,
  area,
  merge,
  approxEqual,
  columnsClose,
  flipPair,
} from './Column';
