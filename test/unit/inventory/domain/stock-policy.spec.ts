import {
  buildStockPolicyTable,
  defaultMinimumStock,
  isFixedReference,
  resolveMinimumStock,
  resolveStockPolicyCategory,
} from '@/modules/inventory/domain/stock-policy';

describe('stock policy resolver', () => {
  const table = buildStockPolicyTable({
    policies: [
      { category: 'FIJO_ESPECIAL', quantity: 8 },
      { category: 'multimarca', quantity: '1' },
      { category: 'general', quantity: 6 },
      { category: 'jgl', quantity: null },
      { category: '', quantity: 9 },
      { category: 'jgm', quantity: 'x' },
    ],
    fixedReferenceCodes: [' ref-1 '],
    multiBrandNames: ['varias marcas'],
  });

  it('resolves fixed references by store kind', () => {
    expect(resolveStockPolicyCategory(table, 'REF-1', 'Marca', true)).toBe('fijo_especial');
    expect(resolveMinimumStock(table, 'ref-1', 'Marca', true)).toBe(8);
    expect(resolveStockPolicyCategory(table, 'REF-1', 'Marca', false)).toBe('fijo_normal');
    expect(resolveMinimumStock(table, 'REF-1', 'Marca', false)).toBe(5);
    expect(isFixedReference(table, ' ref-1')).toBe(true);
  });

  it('gives fixed references precedence over multi-brand labels', () => {
    expect(resolveStockPolicyCategory(table, 'REF-1', 'varias marcas', false)).toBe(
      'fijo_normal',
    );
  });

  it('resolves multi-brand labels case-insensitively', () => {
    expect(resolveStockPolicyCategory(table, 'X1', 'Varias Marcas', false)).toBe('multimarca');
    expect(resolveMinimumStock(table, 'X1', 'Varias Marcas', false)).toBe(1);
  });

  it('falls back when a category row is missing or malformed', () => {
    expect(resolveStockPolicyCategory(table, 'ABC-JGL-1', 'Marca', false)).toBe('jgl');
    expect(resolveMinimumStock(table, 'ABC-JGL-1', 'Marca', false)).toBe(3);
    expect(resolveStockPolicyCategory(table, 'X2', 'Linea jgm', false)).toBe('jgm');
    expect(resolveMinimumStock(table, 'X2', 'Linea jgm', false)).toBe(3);
  });

  it('reads the default category from the general alias', () => {
    expect(resolveStockPolicyCategory(table, 'X3', 'Marca', true)).toBe('default');
    expect(resolveMinimumStock(table, 'X3', 'Marca', true)).toBe(6);
    expect(defaultMinimumStock(table)).toBe(6);
  });

  it('prefers the default row over the general alias', () => {
    const withDefault = buildStockPolicyTable({
      policies: [
        { category: 'general', quantity: 6 },
        { category: 'default', quantity: 2 },
      ],
      fixedReferenceCodes: [],
      multiBrandNames: [],
    });

    expect(defaultMinimumStock(withDefault)).toBe(2);
  });

  it('uses built-in fallbacks for an empty table', () => {
    const empty = buildStockPolicyTable({ policies: [], fixedReferenceCodes: [], multiBrandNames: [] });

    expect(defaultMinimumStock(empty)).toBe(4);
    expect(resolveMinimumStock(empty, 'X1', 'Marca', true)).toBe(4);
  });

  it('returns the same minimum on repeated calls', () => {
    const results = Array.from({ length: 3 }, () =>
      resolveMinimumStock(table, 'REF-1', 'Marca', true),
    );

    expect(results).toEqual([8, 8, 8]);
  });
});
