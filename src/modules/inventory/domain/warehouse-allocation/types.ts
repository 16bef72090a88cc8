export interface AllocationCandidate {
  storeName: string;
  fixed: boolean;
  /** Units sold in the replenishment window. */
  sales: number;
  requested: number;
}

/**
 * What happens to a positive request once the item's warehouse quantity is gone:
 * `stop` grants nothing, `force` records the full request (new-item introductions).
 */
export type ExhaustionPolicy = 'stop' | 'force';

export interface AllocationGrant<T extends AllocationCandidate> {
  candidate: T;
  allocated: number;
  forced: boolean;
}

export interface ItemAllocation<T extends AllocationCandidate> {
  /** Grants in priority order. */
  grants: AllocationGrant<T>[];
  /** Warehouse quantity left after the pass. */
  remaining: number;
}
