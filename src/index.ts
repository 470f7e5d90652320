/**
 * simpson-tree - Simpson reversals to any depth
 *
 * Generates a binary hierarchy of treatment/control sub-populations in
 * which the ordering of the two groups' recovery rates flips at every
 * level, while every split conserves population share and recoveries.
 */

// Error handling
export {
  ErrorCode,
  SimpsonError,
  DomainError,
  ParameterError,
  InfeasibleSplitError,
  isSimpsonError,
} from './core/errors';

// Core model
export * from './core/column';
export * from './core/policy';
export * from './core/split';
export * from './core/tree';

// Random number generation
export { RNG } from './core/math/random';

// Consumers of finished layers
export * from './data';
export * from './chart';

// Version
export const VERSION = '0.1.0';
