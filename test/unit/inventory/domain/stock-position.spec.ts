import {
  consolidateStock,
  consolidateWarehouse,
} from '@/modules/inventory/domain/stock-position';
import { buildStoreRegistry } from '@/modules/inventory/domain/store-registry';
import {
  ENGINE_SETTINGS,
  stockRecord,
  storeRecord,
  warehouseRecord,
} from '../../../fixtures/inventory/snapshot';

describe('consolidateStock', () => {
  const registry = buildStoreRegistry(
    [storeRecord('Tienda A', { rawName: 'TA' }), storeRecord('Bodega Central')],
    ENGINE_SETTINGS,
  );

  const position = consolidateStock(
    [
      stockRecord('TA', 'x1', 2, 'Marca A', 'Rojo'),
      stockRecord('Tienda A', 'X1', '3', 'Otra', 'Azul'),
      stockRecord('TA', 'X2', null, '', ''),
      stockRecord('TA', 'X3', -4),
      stockRecord('TA', 'X4', 'abc'),
      stockRecord('TA', ' ', 1),
      stockRecord('Bodega Central', 'X1', 100),
    ],
    registry,
  );

  it('sums duplicate rows per canonical store and item', () => {
    expect(position.lines).toEqual([
      {
        storeKey: 'tienda a',
        storeName: 'Tienda A',
        region: 'NORTE',
        fixed: false,
        itemCode: 'X1',
        brand: 'Marca A',
        color: 'Rojo',
        available: 5,
      },
      {
        storeKey: 'tienda a',
        storeName: 'Tienda A',
        region: 'NORTE',
        fixed: false,
        itemCode: 'X2',
        brand: 'SIN MARCA',
        color: 'SIN COLOR',
        available: 0,
      },
      {
        storeKey: 'tienda a',
        storeName: 'Tienda A',
        region: 'NORTE',
        fixed: false,
        itemCode: 'X3',
        brand: 'MARCA A',
        color: 'NEGRO',
        available: 0,
      },
    ]);
  });

  it('records carried pairs even at zero stock', () => {
    expect(position.carried.has('tienda a|X2')).toBe(true);
    expect(position.carried.has('bodega central|X1')).toBe(false);
  });

  it('keeps brand and color from the first row of each item', () => {
    expect(position.infoByItem.get('X1')).toEqual({ brand: 'Marca A', color: 'Rojo' });
  });

  it('counts malformed rows', () => {
    expect(position.skippedRows).toBe(2);
  });
});

describe('consolidateWarehouse', () => {
  it('sums quantities per item and counts malformed rows', () => {
    const warehouse = consolidateWarehouse([
      warehouseRecord('x1', 3),
      warehouseRecord('X1', '2.5'),
      warehouseRecord('X2', null),
      warehouseRecord('X3', '??'),
      { itemCode: null, available: 1 },
    ]);

    expect([...warehouse.availableByItem.entries()]).toEqual([
      ['X1', 5],
      ['X2', 0],
    ]);
    expect(warehouse.skippedRows).toBe(2);
  });
});
