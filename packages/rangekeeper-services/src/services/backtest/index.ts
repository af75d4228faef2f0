export { BacktestRunner } from './backtest-runner.js';
export type { BacktestRunnerDependencies, BacktestSummary } from './backtest-runner.js';
export { RebalancePolicy } from './rebalance-policy.js';
export type { PolicyConfig, WickDetection, RebalanceDecision } from './rebalance-policy.js';
export { PositionRecorder, CSV_HEADER } from './position-recorder.js';
export type { RecordedPoint, RecordingSummary } from './position-recorder.js';
