import { normalizeStoreKey } from '../../../../common/utils/text-normalize.utils';
import type { StoreRegistryRecord } from '../inventory-snapshot';
import { parseFlag } from '../quantities';
import {
  UNMAPPED_REGION,
  type CanonicalStore,
  type StoreRegistry,
  type StoreRegistryOptions,
} from './types';

export function buildStoreRegistry(
  records: readonly StoreRegistryRecord[],
  options: StoreRegistryOptions,
): StoreRegistry {
  const byRawKey = new Map<string, CanonicalStore>();
  const byCleanKey = new Map<string, CanonicalStore>();
  const marker = normalizeStoreKey(options.centralWarehouseMarker);

  for (const record of records) {
    const rawKey = normalizeStoreKey(record.rawName);
    const cleanName = (record.cleanName ?? '').trim() || (record.rawName ?? '').trim();
    const cleanKey = normalizeStoreKey(cleanName);
    if (cleanKey.length === 0) {
      continue;
    }

    let store = byCleanKey.get(cleanKey);
    if (!store) {
      store = {
        key: cleanKey,
        name: cleanName.replace(/\s+/g, ' '),
        region: (record.region ?? '').trim() || UNMAPPED_REGION,
        fixed: parseFlag(record.fixed, false),
        storeType: (record.storeType ?? '').trim() || null,
        active: parseFlag(record.active, true),
        mapped: true,
      };
      byCleanKey.set(cleanKey, store);
    }

    if (rawKey.length > 0 && !byRawKey.has(rawKey)) {
      byRawKey.set(rawKey, store);
    }
  }

  const isCentralWarehouse = (store: CanonicalStore): boolean =>
    marker.length > 0 &&
    (store.key.includes(marker) || normalizeStoreKey(store.storeType) === marker);

  const configured = [...byCleanKey.values()]
    .filter((store) => !isCentralWarehouse(store))
    .sort(compareStoreNames);

  return {
    resolve(rawName) {
      const key = normalizeStoreKey(rawName);
      const known = byRawKey.get(key) ?? byCleanKey.get(key);
      if (known) {
        return known;
      }

      return {
        key,
        name: (rawName ?? '').trim().replace(/\s+/g, ' '),
        region: UNMAPPED_REGION,
        fixed: false,
        storeType: null,
        active: true,
        mapped: false,
      };
    },
    isCentralWarehouse,
    activeStores: () => configured.filter((store) => store.active),
    configuredStores: () => [...configured],
  };
}

export function compareStoreNames(left: CanonicalStore, right: CanonicalStore): number {
  return compareText(left.name, right.name);
}

/** Code-point order, independent of the process locale. */
export function compareText(left: string, right: string): number {
  if (left === right) {
    return 0;
  }

  return left < right ? -1 : 1;
}
