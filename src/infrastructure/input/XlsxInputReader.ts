/**
 * XLSX Input Reader
 * Layer: Infrastructure
 *
 * Reads the first worksheet with exceljs; row 1 is the header. Cell values are
 * taken through `cell.text`, so numbers, dates and rich text all arrive as the
 * string the spreadsheet shows. Fully blank rows are skipped. A file exceljs
 * cannot open (corrupt, or not a zip at all) is an InputFormatError.
 */
import type { IInputReader } from '@domain/interfaces/IInputReader';
import { InputFormatError } from '@shared/errors/AppError';
import type { RawInputRow, TabularInput } from '@shared/types';
import { Workbook } from 'exceljs';

export class XlsxInputReader implements IInputReader {
  async read(filePath: string): Promise<TabularInput> {
    const workbook = new Workbook();
    try {
      await workbook.xlsx.readFile(filePath);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new InputFormatError(`Cannot read workbook ${filePath}: ${reason}`);
    }

    const sheet = workbook.worksheets[0];
    if (!sheet) {
      throw new InputFormatError(`Workbook has no worksheets: ${filePath}`);
    }

    const headers: string[] = [];
    sheet.getRow(1).eachCell({ includeEmpty: true }, (cell, column) => {
      headers[column - 1] = cell.text.trim();
    });

    const rows: RawInputRow[] = [];
    for (let rowNumber = 2; rowNumber <= sheet.rowCount; rowNumber++) {
      const row = sheet.getRow(rowNumber);
      const record: RawInputRow = {};
      let hasValue = false;
      headers.forEach((header, index) => {
        if (!header) return;
        const value = row.getCell(index + 1).text.trim();
        if (value) hasValue = true;
        record[header] = value;
      });
      if (hasValue) rows.push(record);
    }

    return { headers: headers.filter((header) => header.length > 0), rows };
  }
}
