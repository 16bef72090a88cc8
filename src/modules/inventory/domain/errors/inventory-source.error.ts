export type InventorySourceOperation = 'connect' | 'query';

/**
 * Thrown when the relational store cannot produce a consistent snapshot.
 * The driver error is kept as `cause`.
 */
export class InventorySourceError extends Error {
  constructor(
    message: string,
    public readonly operation: InventorySourceOperation,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'InventorySourceError';
  }
}
