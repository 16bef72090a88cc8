export { ExportWorkbookUseCase } from './export-workbook.use-case';
export type { ExportedWorkbook } from './export-workbook.use-case';
export {
  applyExportFilters,
  buildAllocationSheets,
  buildRedistributionSheets,
  filterSuggestionsByOrigin,
  toSheetName,
} from './workbook-layout';
