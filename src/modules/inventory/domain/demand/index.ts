export { aggregateDemand, demandKey, salesAt } from './aggregate';
export type { DemandAggregate } from './aggregate';
