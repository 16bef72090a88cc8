export { buildStoreRegistry, compareStoreNames, compareText } from './registry';
export { UNMAPPED_REGION } from './types';
export type { CanonicalStore, StoreRegistry, StoreRegistryOptions } from './types';
