export {
  StatsError,
  InvalidInputError,
  DegenerateInputError,
  ErrorCode,
  isStatsError,
  wrapError,
} from './StatsError';
export type { ErrorContext } from './StatsError';
