export { allocateItem } from './allocate';
export { compareAllocationPriority, priorityScore } from './priority';
export {
  ALLOCATION_STATUSES,
  allocateDrafts,
  replenishmentStatus,
} from './rows';
export type {
  AllocatedDraft,
  AllocationRow,
  AllocationStatus,
  DemandDraft,
  DemandKind,
} from './rows';
export type {
  AllocationCandidate,
  AllocationGrant,
  ExhaustionPolicy,
  ItemAllocation,
} from './types';
