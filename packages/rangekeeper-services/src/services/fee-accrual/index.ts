export { FeeAccrualService } from './fee-accrual-service.js';
export type {
  FeeAccrualServiceDependencies,
  FeeComputationInput,
  FeeAccrualResult,
  CalculateFeesInput,
  FeeCalculator,
} from './fee-accrual-service.js';
