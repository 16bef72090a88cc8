import {
  allocateDrafts,
  allocateItem,
  priorityScore,
  replenishmentStatus,
  type AllocationCandidate,
  type DemandDraft,
} from '@/modules/inventory/domain/warehouse-allocation';

function candidate(
  storeName: string,
  overrides: Partial<AllocationCandidate> = {},
): AllocationCandidate {
  return { storeName, fixed: false, sales: 0, requested: 0, ...overrides };
}

function draft(storeName: string, overrides: Partial<DemandDraft> = {}): DemandDraft {
  return {
    storeKey: storeName.toLowerCase(),
    storeName,
    region: 'NORTE',
    fixed: false,
    sales: 0,
    requested: 0,
    itemCode: 'X1',
    brand: 'MARCA A',
    color: 'NEGRO',
    currentStock: 0,
    minimumStock: 4,
    ...overrides,
  };
}

function summarizeGrants(grants: { candidate: AllocationCandidate; allocated: number }[]) {
  return grants.map((grant) => [grant.candidate.storeName, grant.allocated]);
}

describe('allocateItem', () => {
  it('serves a fixed store before a higher-selling store', () => {
    const result = allocateItem(5, [
      candidate('S2', { sales: 10, requested: 4 }),
      candidate('S1', { fixed: true, requested: 5 }),
    ]);

    expect(summarizeGrants(result.grants)).toEqual([
      ['S1', 5],
      ['S2', 0],
    ]);
    expect(result.remaining).toBe(0);
  });

  it('ranks fixed stores ahead of any sales volume', () => {
    const fixed = candidate('Fija', { fixed: true, requested: 1 });
    const busy = candidate('Activa', { sales: 500, requested: 1 });

    expect(priorityScore(fixed)).toBe(100);
    expect(priorityScore(busy)).toBe(500);
    expect(summarizeGrants(allocateItem(1, [busy, fixed]).grants)).toEqual([
      ['Fija', 1],
      ['Activa', 0],
    ]);
  });

  it('orders by sales and then store name', () => {
    const result = allocateItem(3, [
      candidate('Beta', { sales: 3, requested: 2 }),
      candidate('Gamma', { sales: 9, requested: 1 }),
      candidate('Alfa', { sales: 3, requested: 2 }),
    ]);

    expect(summarizeGrants(result.grants)).toEqual([
      ['Gamma', 1],
      ['Alfa', 2],
      ['Beta', 0],
    ]);
  });

  it('skips zero requests without consuming stock', () => {
    const result = allocateItem(2, [
      candidate('A', { sales: 5, requested: 0 }),
      candidate('B', { sales: 1, requested: 2 }),
    ]);

    expect(summarizeGrants(result.grants)).toEqual([
      ['A', 0],
      ['B', 2],
    ]);
  });

  it('forces full requests once stock runs out under the force policy', () => {
    const result = allocateItem(
      2,
      [candidate('B', { requested: 4 }), candidate('A', { requested: 3 })],
      'force',
    );

    expect(result.grants.map((grant) => [grant.candidate.storeName, grant.allocated, grant.forced])).toEqual([
      ['A', 2, false],
      ['B', 4, true],
    ]);
    expect(result.remaining).toBe(0);
  });

  it('never exceeds the available quantity or a request under the stop policy', () => {
    let seed = 7;
    const next = (limit: number): number => {
      seed = (seed * 16807) % 2147483647;
      return seed % limit;
    };

    for (let round = 0; round < 50; round += 1) {
      const available = next(30);
      const candidates = Array.from({ length: 1 + next(6) }, (_, index) =>
        candidate(`T${index}`, { fixed: next(2) === 1, sales: next(20), requested: next(10) }),
      );

      const result = allocateItem(available, candidates);
      const total = result.grants.reduce((sum, grant) => sum + grant.allocated, 0);

      expect(total).toBeLessThanOrEqual(available);
      expect(result.remaining).toBe(available - total);
      for (const grant of result.grants) {
        expect(grant.allocated).toBeLessThanOrEqual(grant.candidate.requested);
      }
    }
  });

  it('is independent of input order', () => {
    const stores = [
      candidate('A', { sales: 2, requested: 3 }),
      candidate('B', { sales: 2, requested: 3 }),
      candidate('C', { fixed: true, requested: 1 }),
    ];

    const forward = allocateItem(4, stores);
    const backward = allocateItem(4, [...stores].reverse());

    expect(summarizeGrants(backward.grants)).toEqual(summarizeGrants(forward.grants));
  });
});

describe('replenishmentStatus', () => {
  it('derives the status from request and allocation', () => {
    expect(replenishmentStatus(0, 0)).toBe('OK');
    expect(replenishmentStatus(3, 1)).toBe('REABASTECER');
    expect(replenishmentStatus(3, 0)).toBe('COMPRA');
  });
});

describe('allocateDrafts', () => {
  it('writes warehouse stock before and after the pass on every row', () => {
    const rows = allocateDrafts('replenishment', 5, [
      draft('S2', { sales: 10, requested: 4 }),
      draft('S1', { fixed: true, requested: 5, minimumStock: 5 }),
    ]).map((entry) => entry.row);

    expect(rows).toEqual([
      {
        region: 'NORTE',
        store: 'S1',
        fixedStore: true,
        itemCode: 'X1',
        brand: 'MARCA A',
        color: 'NEGRO',
        salesInWindow: 0,
        currentStock: 0,
        warehouseStockBefore: 5,
        warehouseStockAfter: 0,
        minimumStock: 5,
        requestedQuantity: 5,
        allocatedQuantity: 5,
        status: 'REABASTECER',
      },
      {
        region: 'NORTE',
        store: 'S2',
        fixedStore: false,
        itemCode: 'X1',
        brand: 'MARCA A',
        color: 'NEGRO',
        salesInWindow: 10,
        currentStock: 0,
        warehouseStockBefore: 5,
        warehouseStockAfter: 0,
        minimumStock: 4,
        requestedQuantity: 4,
        allocatedQuantity: 0,
        status: 'COMPRA',
      },
    ]);
  });

  it('labels expansion and new-item rows by pass', () => {
    const expansion = allocateDrafts('expansion', 0, [draft('A', { requested: 4 })]);
    const introduced = allocateDrafts('new_item', 0, [draft('A', { requested: 4 })]);

    expect(expansion.map((entry) => [entry.row.status, entry.row.allocatedQuantity])).toEqual([
      ['EXPANSION', 0],
    ]);
    expect(introduced.map((entry) => [entry.row.status, entry.row.allocatedQuantity])).toEqual([
      ['NUEVO', 4],
    ]);
  });
});
