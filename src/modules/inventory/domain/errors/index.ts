export { InvalidWindowError } from './invalid-window.error';
export {
  InventorySourceError,
  type InventorySourceOperation,
} from './inventory-source.error';
