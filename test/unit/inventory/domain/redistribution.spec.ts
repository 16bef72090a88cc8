import {
  isDestination,
  isOrigin,
  matchRedistribution,
  runRedistribution,
  suggestTransfer,
  type RedistributionParams,
  type StorePosition,
} from '@/modules/inventory/domain/redistribution';
import {
  AS_OF,
  ENGINE_SETTINGS,
  buildSnapshot,
  saleRecord,
  stockRecord,
  storeRecord,
} from '../../../fixtures/inventory/snapshot';

function params(overrides: Partial<RedistributionParams> = {}): RedistributionParams {
  return { windowDays: 30, minDestinationSales: 1, asOf: AS_OF, ...overrides };
}

function position(storeName: string, overrides: Partial<StorePosition> = {}): StorePosition {
  return {
    storeKey: storeName.toLowerCase(),
    storeName,
    region: 'NORTE',
    fixed: false,
    itemCode: 'X1',
    brand: 'MARCA A',
    stock: 0,
    minimumStock: 4,
    sales: 0,
    ...overrides,
  };
}

describe('redistribution matcher', () => {
  it('classifies origins and destinations', () => {
    expect(isOrigin(position('O', { stock: 10 }))).toBe(true);
    expect(isOrigin(position('O', { stock: 10, sales: 1 }))).toBe(false);
    expect(isOrigin(position('O', { stock: 10, fixed: true }))).toBe(false);
    expect(isDestination(position('D', { stock: 1, sales: 2 }), 1)).toBe(true);
    expect(isDestination(position('D', { stock: 1, sales: 2 }), 3)).toBe(false);
  });

  it('moves half the surplus capped by the deficit, at least one unit', () => {
    expect(suggestTransfer(position('O', { stock: 10 }), position('D', { stock: 1 }))).toBe(3);
    expect(suggestTransfer(position('O', { stock: 5 }), position('D', { stock: 1 }))).toBe(1);
    expect(suggestTransfer(position('O', { stock: 4 }), position('D', { stock: 1 }))).toBe(0);
  });

  it('computes every destination against the full surplus', () => {
    const suggestions = matchRedistribution(
      [
        position('O', { stock: 10 }),
        position('D2', { stock: 1, sales: 1 }),
        position('D1', { stock: 0, sales: 1 }),
      ],
      { minDestinationSales: 1 },
    );

    expect(suggestions.map((row) => [row.destinationStore, row.suggestedQuantity])).toEqual([
      ['D1', 3],
      ['D2', 3],
    ]);
  });

  it('never pairs across regions or brands', () => {
    const suggestions = matchRedistribution(
      [
        position('O', { stock: 10 }),
        position('D1', { stock: 0, sales: 1, region: 'SUR' }),
        position('D2', { stock: 0, sales: 1, brand: 'MARCA B' }),
      ],
      { minDestinationSales: 1 },
    );

    expect(suggestions).toEqual([]);
  });

  it('never suggests a fixed store as origin', () => {
    let seed = 11;
    const next = (limit: number): number => {
      seed = (seed * 16807) % 2147483647;
      return seed % limit;
    };
    const positions = Array.from({ length: 40 }, (_, index) =>
      position(`T${index}`, {
        fixed: next(2) === 1,
        stock: next(12),
        sales: next(3),
      }),
    );
    const fixedNames = new Set(positions.filter((row) => row.fixed).map((row) => row.storeName));

    for (const suggestion of matchRedistribution(positions, { minDestinationSales: 1 })) {
      expect(fixedNames.has(suggestion.originStore)).toBe(false);
    }
  });
});

describe('runRedistribution', () => {
  const baseSnapshot = buildSnapshot({
    stores: [
      storeRecord('O'),
      storeRecord('D'),
      storeRecord('O2', { region: 'SUR' }),
      storeRecord('D2', { region: 'SUR' }),
    ],
    sales: [saleRecord('D', 'X1', 2, 1), saleRecord('D2', 'X1', 4, 2)],
    stock: [
      stockRecord('O', 'X1', 10),
      stockRecord('D', 'X1', 1),
      stockRecord('O2', 'X1', 8),
      stockRecord('D2', 'X1', 0),
    ],
  });

  it('suggests transfers from dormant surplus to selling stores in the same region', () => {
    const result = runRedistribution(baseSnapshot, params(), ENGINE_SETTINGS);

    expect(result.suggestions).toEqual([
      {
        region: 'NORTE',
        itemCode: 'X1',
        brand: 'MARCA A',
        originStore: 'O',
        destinationStore: 'D',
        originStock: 10,
        destinationStock: 1,
        suggestedQuantity: 3,
      },
      {
        region: 'SUR',
        itemCode: 'X1',
        brand: 'MARCA A',
        originStore: 'O2',
        destinationStore: 'D2',
        originStock: 8,
        destinationStock: 0,
        suggestedQuantity: 2,
      },
    ]);
    expect(result.summary).toEqual({
      totalSuggestions: 2,
      suggestedUnits: 5,
      skippedSalesRows: 0,
      skippedStockRows: 0,
    });
  });

  it('limits suggestions to the requested origin store', () => {
    const result = runRedistribution(baseSnapshot, params({ originStore: ' o ' }), ENGINE_SETTINGS);

    expect(result.suggestions.map((row) => [row.originStore, row.destinationStore])).toEqual([
      ['O', 'D'],
    ]);
  });

  it('returns nothing when the origin store has no surplus', () => {
    const result = runRedistribution(baseSnapshot, params({ originStore: 'D' }), ENGINE_SETTINGS);

    expect(result.suggestions).toEqual([]);
    expect(result.summary.suggestedUnits).toBe(0);
  });

  it('counts destination sales per store and item whatever brand the sale rows carry', () => {
    const result = runRedistribution(
      buildSnapshot({
        stores: [storeRecord('O'), storeRecord('D')],
        sales: [saleRecord('D', 'X1', 2, 1, 'MARCA B')],
        stock: [stockRecord('O', 'X1', 10), stockRecord('D', 'X1', 1)],
      }),
      params(),
      ENGINE_SETTINGS,
    );

    expect(result.suggestions.map((row) => [row.brand, row.suggestedQuantity])).toEqual([
      ['MARCA A', 3],
    ]);
  });

  it('matches stores whose stock and sale rows have no brand', () => {
    const result = runRedistribution(
      buildSnapshot({
        stores: [storeRecord('O'), storeRecord('D')],
        sales: [saleRecord('D', 'Z1', 2, 1, null)],
        stock: [stockRecord('O', 'Z1', 10, null), stockRecord('D', 'Z1', 1, null)],
      }),
      params(),
      ENGINE_SETTINGS,
    );

    expect(result.suggestions).toEqual([
      {
        region: 'NORTE',
        itemCode: 'Z1',
        brand: 'SIN MARCA',
        originStore: 'O',
        destinationStore: 'D',
        originStock: 10,
        destinationStock: 1,
        suggestedQuantity: 3,
      },
    ]);
  });

  it('never uses a fixed store as origin', () => {
    const result = runRedistribution(
      buildSnapshot({
        stores: [storeRecord('O', { fixed: 1 }), storeRecord('D')],
        sales: [saleRecord('D', 'X1', 2, 1)],
        stock: [stockRecord('O', 'X1', 10), stockRecord('D', 'X1', 1)],
      }),
      params(),
      ENGINE_SETTINGS,
    );

    expect(result.suggestions).toEqual([]);
  });
});
