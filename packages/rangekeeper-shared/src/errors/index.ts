export {
  BacktestError,
  InvalidInputError,
  FutureTargetError,
  NoConvergenceError,
  InvalidRangeError,
  DegenerateRangeError,
  InvalidPeriodError,
  UpstreamUnavailableError,
  isBacktestError,
  type BacktestErrorCode,
} from './backtest-errors.js';
