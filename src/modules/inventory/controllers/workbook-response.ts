import { StreamableFile } from '@nestjs/common';
import type { ExportedWorkbook } from '../application/use-cases/export-workbook';

export const XLSX_CONTENT_TYPE =
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export function toWorkbookFile(workbook: ExportedWorkbook): StreamableFile {
  return new StreamableFile(workbook.content, {
    type: XLSX_CONTENT_TYPE,
    disposition: `attachment; filename="${workbook.filename}"`,
    length: workbook.content.length,
  });
}
