export {
  ErrorCode,
  SimpsonError,
  DomainError,
  ParameterError,
  InfeasibleSplitError,
  isSimpsonError,
} from './SimpsonError';
