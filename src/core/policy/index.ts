export type { SplitParameters, TreePosition, ParameterPolicy, JitterOptions } from './ParameterPolicy';

export {
  DEFAULT_PARAMETERS,
  validateParameters,
  pathOf,
  positionOf,
  fixedPolicy,
  positionalPolicy,
  jitteredPolicy,
} from './ParameterPolicy';
