export { ComputeReplenishmentUseCase } from './compute-replenishment.use-case';
export type { ReplenishmentResponse } from './compute-replenishment.use-case';
