export { ComputeRedistributionUseCase } from './compute-redistribution.use-case';
export type { RedistributionResponse } from './compute-redistribution.use-case';
