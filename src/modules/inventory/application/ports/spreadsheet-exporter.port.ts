export type SpreadsheetCell = string | number;

export interface SpreadsheetSheet {
  name: string;
  header: string[];
  rows: SpreadsheetCell[][];
}

export interface SpreadsheetExporterPort {
  renderWorkbook(sheets: readonly SpreadsheetSheet[]): Buffer;
}
