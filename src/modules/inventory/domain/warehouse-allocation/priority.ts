import { compareText } from '../store-registry';
import type { AllocationCandidate } from './types';

const FIXED_STORE_OFFSET = 100;

/**
 * Informational score `100 * fixed + sales`. Ordering never sums it: it
 * compares `(fixed, sales)` lexicographically so a fixed store outranks any
 * sales volume.
 */
export function priorityScore(candidate: Pick<AllocationCandidate, 'fixed' | 'sales'>): number {
  return (candidate.fixed ? FIXED_STORE_OFFSET : 0) + candidate.sales;
}

/** Fixed stores first, then higher sales, then canonical store name ascending. */
export function compareAllocationPriority(
  left: AllocationCandidate,
  right: AllocationCandidate,
): number {
  if (left.fixed !== right.fixed) {
    return left.fixed ? -1 : 1;
  }
  if (left.sales !== right.sales) {
    return right.sales - left.sales;
  }

  return compareText(left.storeName, right.storeName);
}
