export {
  compareSuggestions,
  isDestination,
  isOrigin,
  matchKey,
  matchRedistribution,
  suggestTransfer,
} from './matcher';
export { runRedistribution } from './run';
export type {
  RedistributionParams,
  RedistributionResult,
  RedistributionSuggestion,
  RedistributionSummary,
  StorePosition,
} from './types';
