/**
 * CSV Input Reader
 * Layer: Infrastructure
 *
 * papaparse with a header row; blank lines are skipped and header names are
 * trimmed. An unbalanced quote rejects the whole file, since papaparse would
 * merge the rows after it. Ragged rows are kept: a missing cell comes through
 * as undefined (the adapter reads it as an empty geohash, a row-level error)
 * and extra cells land in `__parsed_extra`, which nothing reads.
 */
import type { IInputReader } from '@domain/interfaces/IInputReader';
import { InputFormatError } from '@shared/errors/AppError';
import type { RawInputRow, TabularInput } from '@shared/types';
import fs from 'fs/promises';
import Papa from 'papaparse';

export class CsvInputReader implements IInputReader {
  async read(filePath: string): Promise<TabularInput> {
    const text = (await fs.readFile(filePath, 'utf-8')).replace(/^\uFEFF/, '');
    return parseCsvText(text);
  }
}

export function parseCsvText(text: string): TabularInput {
  const result = Papa.parse<RawInputRow>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });

  const fatal = result.errors.filter((error) => error.type === 'Quotes');
  if (fatal.length > 0) {
    const [first] = fatal;
    const where = first.row !== undefined ? ` (data row ${first.row + 1})` : '';
    throw new InputFormatError(`CSV parse error${where}: ${first.message}`);
  }

  return { headers: result.meta.fields ?? [], rows: result.data };
}
