export { PositionLifecycleService } from './position-lifecycle-service.js';
export type {
  PositionLifecycleServiceDependencies,
  CloseResult,
  RebalanceResult,
} from './position-lifecycle-service.js';
