export const UNMAPPED_REGION = 'SIN REGION';

export interface CanonicalStore {
  /** Normalized clean name; the join key for every store comparison. */
  key: string;
  name: string;
  region: string;
  fixed: boolean;
  storeType: string | null;
  active: boolean;
  /** False when the raw identifier has no registry entry. */
  mapped: boolean;
}

export interface StoreRegistry {
  resolve(rawName: string | null | undefined): CanonicalStore;
  isCentralWarehouse(store: CanonicalStore): boolean;
  /** Mapped stores that receive merchandise: active and not the central warehouse. */
  activeStores(): CanonicalStore[];
  /** Every mapped store except the central warehouse, active or not. */
  configuredStores(): CanonicalStore[];
}

export interface StoreRegistryOptions {
  /** Normalized marker identifying the central warehouse by name or store type. */
  centralWarehouseMarker: string;
}
