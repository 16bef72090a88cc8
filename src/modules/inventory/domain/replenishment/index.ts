export { assertValidWindows, compareAllocationRows, runReplenishment } from './run';
export type {
  EngineSettings,
  FailedItem,
  ReplenishmentParams,
  ReplenishmentResult,
  ReplenishmentSummary,
} from './types';
