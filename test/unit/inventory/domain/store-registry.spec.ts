import { buildStoreRegistry, UNMAPPED_REGION } from '@/modules/inventory/domain/store-registry';
import { ENGINE_SETTINGS } from '../../../fixtures/inventory/snapshot';

describe('buildStoreRegistry', () => {
  const registry = buildStoreRegistry(
    [
      {
        rawName: 'TDA NORTE 01',
        cleanName: 'Tienda Norte',
        region: 'NORTE',
        fixed: 1,
        storeType: 'tienda',
        active: 1,
      },
      {
        rawName: 'NORTE-2',
        cleanName: 'tienda  norte',
        region: 'OTRA',
        fixed: 0,
        storeType: 'tienda',
        active: 1,
      },
      {
        rawName: 'BODEGA PPAL',
        cleanName: 'Bodega Principal',
        region: 'CENTRO',
        fixed: 0,
        storeType: null,
        active: 1,
      },
      {
        rawName: 'CD-01',
        cleanName: 'Centro Distribucion',
        region: 'CENTRO',
        fixed: 0,
        storeType: 'Bodega',
        active: 1,
      },
      {
        rawName: 'TDA SUR',
        cleanName: 'Tienda Sur',
        region: 'SUR',
        fixed: '0',
        storeType: 'tienda',
        active: 'no',
      },
      {
        rawName: 'TDA ANDES',
        cleanName: 'Árbol Andes',
        region: null,
        fixed: 'si',
        storeType: 'tienda',
        active: null,
      },
    ],
    ENGINE_SETTINGS,
  );

  it('resolves raw identifiers to the canonical store', () => {
    expect(registry.resolve(' tda norte 01 ')).toEqual({
      key: 'tienda norte',
      name: 'Tienda Norte',
      region: 'NORTE',
      fixed: true,
      storeType: 'tienda',
      active: true,
      mapped: true,
    });
  });

  it('keeps the first registry row when two rows share a clean name', () => {
    expect(registry.resolve('NORTE-2').region).toBe('NORTE');
  });

  it('resolves clean names as well as raw names', () => {
    const store = registry.resolve('TIENDA SUR');

    expect(store.name).toBe('Tienda Sur');
    expect(store.active).toBe(false);
  });

  it('falls back to an unmapped store for unknown identifiers', () => {
    expect(registry.resolve('  Tienda   Nueva ')).toEqual({
      key: 'tienda nueva',
      name: 'Tienda Nueva',
      region: UNMAPPED_REGION,
      fixed: false,
      storeType: null,
      active: true,
      mapped: false,
    });
  });

  it('parses flags and missing regions', () => {
    const store = registry.resolve('TDA ANDES');

    expect(store.key).toBe('arbol andes');
    expect(store.region).toBe('SIN REGION');
    expect(store.fixed).toBe(true);
    expect(store.active).toBe(true);
  });

  it('detects the central warehouse by name or store type', () => {
    expect(registry.isCentralWarehouse(registry.resolve('BODEGA PPAL'))).toBe(true);
    expect(registry.isCentralWarehouse(registry.resolve('CD-01'))).toBe(true);
    expect(registry.isCentralWarehouse(registry.resolve('TDA NORTE 01'))).toBe(false);
  });

  it('lists configured and active stores without the central warehouse', () => {
    expect(registry.configuredStores().map((store) => store.name)).toEqual([
      'Tienda Norte',
      'Tienda Sur',
      'Árbol Andes',
    ]);
    expect(registry.activeStores().map((store) => store.name)).toEqual([
      'Tienda Norte',
      'Árbol Andes',
    ]);
  });
});
