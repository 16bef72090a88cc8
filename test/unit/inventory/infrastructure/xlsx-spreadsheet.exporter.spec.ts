import * as XLSX from 'xlsx';
import { XlsxSpreadsheetExporter } from '@/modules/inventory/infrastructure/adapters/spreadsheet/xlsx-spreadsheet.exporter';

describe('XlsxSpreadsheetExporter', () => {
  it('writes one worksheet per sheet with header and rows', () => {
    const exporter = new XlsxSpreadsheetExporter();

    const content = exporter.renderWorkbook([
      {
        name: 'Tienda A',
        header: ['Cod.Barras', 'Marca', 'Cantidad'],
        rows: [['7701234567890', 'MARCA A', 5]],
      },
      {
        name: 'Tienda B',
        header: ['Cod.Barras', 'Marca', 'Cantidad'],
        rows: [],
      },
    ]);

    const workbook = XLSX.read(content, { type: 'buffer' });
    expect(workbook.SheetNames).toEqual(['Tienda A', 'Tienda B']);
    expect(
      XLSX.utils.sheet_to_json<Array<string | number>>(workbook.Sheets['Tienda A'], { header: 1 }),
    ).toEqual([
      ['Cod.Barras', 'Marca', 'Cantidad'],
      ['7701234567890', 'MARCA A', 5],
    ]);
    expect(
      XLSX.utils.sheet_to_json<Array<string | number>>(workbook.Sheets['Tienda B'], { header: 1 }),
    ).toEqual([['Cod.Barras', 'Marca', 'Cantidad']]);
  });
});
