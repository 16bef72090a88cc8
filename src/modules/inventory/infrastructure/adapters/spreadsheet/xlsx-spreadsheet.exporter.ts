import { Injectable } from '@nestjs/common';
import * as XLSX from 'xlsx';
import type {
  SpreadsheetExporterPort,
  SpreadsheetSheet,
} from '../../../application/ports/spreadsheet-exporter.port';

const MIN_COLUMN_WIDTH = 8;
const MAX_COLUMN_WIDTH = 40;

@Injectable()
export class XlsxSpreadsheetExporter implements SpreadsheetExporterPort {
  renderWorkbook(sheets: readonly SpreadsheetSheet[]): Buffer {
    const workbook = XLSX.utils.book_new();

    for (const sheet of sheets) {
      const worksheet = XLSX.utils.aoa_to_sheet([sheet.header, ...sheet.rows]);
      worksheet['!cols'] = sheet.header.map((title, column) => ({
        wch: columnWidth(title, sheet.rows.map((row) => row[column])),
      }));
      XLSX.utils.book_append_sheet(workbook, worksheet, sheet.name);
    }

    const output: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
    if (!Buffer.isBuffer(output)) {
      throw new Error('xlsx writer did not return a buffer');
    }

    return output;
  }
}

function columnWidth(title: string, values: ReadonlyArray<string | number | undefined>): number {
  const longest = values.reduce<number>(
    (width, value) => Math.max(width, String(value ?? '').length),
    title.length,
  );

  return Math.min(MAX_COLUMN_WIDTH, Math.max(MIN_COLUMN_WIDTH, longest + 2));
}
