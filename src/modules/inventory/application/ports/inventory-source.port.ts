import type { InventorySnapshot } from '../../domain/inventory-snapshot';

export interface InventorySourcePort {
  /**
   * Reads sales history, stock snapshots, warehouse stock and reference tables
   * as one consistent snapshot. Rejects with `InventorySourceError`.
   */
  loadSnapshot(): Promise<InventorySnapshot>;
}
