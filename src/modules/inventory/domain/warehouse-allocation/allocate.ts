import { toUnits } from '../quantities';
import { compareAllocationPriority } from './priority';
import type {
  AllocationCandidate,
  AllocationGrant,
  ExhaustionPolicy,
  ItemAllocation,
} from './types';

/**
 * Greedy allocation of one item's warehouse quantity across competing stores.
 *
 * `available` is the accumulator for this item only: it is threaded through the
 * walk and returned as `remaining`, never shared with another item's pass.
 */
export function allocateItem<T extends AllocationCandidate>(
  available: number,
  candidates: readonly T[],
  policy: ExhaustionPolicy = 'stop',
): ItemAllocation<T> {
  let remaining = toUnits(available);
  const ordered = [...candidates].sort(compareAllocationPriority);
  const grants: AllocationGrant<T>[] = [];

  for (const candidate of ordered) {
    const requested = toUnits(candidate.requested);

    if (requested === 0) {
      grants.push({ candidate, allocated: 0, forced: false });
      continue;
    }

    if (remaining > 0) {
      const allocated = Math.min(requested, remaining);
      remaining -= allocated;
      grants.push({ candidate, allocated, forced: false });
      continue;
    }

    if (policy === 'force') {
      grants.push({ candidate, allocated: requested, forced: true });
      continue;
    }

    grants.push({ candidate, allocated: 0, forced: false });
  }

  return { grants, remaining };
}
