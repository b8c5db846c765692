/**
 * Input Reader Factory
 * Layer: Application
 * Pattern: Factory Pattern
 *
 * I map the input file's extension to the reader that understands it:
 * .csv/.txt → CsvInputReader (papaparse), .xlsx → XlsxInputReader (exceljs).
 * Legacy .xls is binary BIFF, which exceljs can't read, so it is refused with
 * a hint rather than misparsed.
 */
import type { IInputReader } from '@domain/interfaces/IInputReader';
import { CsvInputReader } from '@infrastructure/input/CsvInputReader';
import { XlsxInputReader } from '@infrastructure/input/XlsxInputReader';
import { InputFormatError } from '@shared/errors/AppError';
import path from 'path';
import { injectable } from 'tsyringe';

@injectable()
export class InputReaderFactory {
  create(filePath: string): IInputReader {
    const extension = path.extname(filePath).toLowerCase();
    switch (extension) {
      case '.csv':
      case '.txt':
        return new CsvInputReader();
      case '.xlsx':
        return new XlsxInputReader();
      case '.xls':
        throw new InputFormatError(
          `Legacy .xls workbooks are not supported; save ${path.basename(filePath)} as .xlsx`,
        );
      default:
        throw new InputFormatError(
          `Unsupported input file type "${extension || '(none)'}"; expected .csv or .xlsx`,
        );
    }
  }
}
