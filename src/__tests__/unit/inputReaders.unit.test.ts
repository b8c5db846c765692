/**
 * Unit Tests — Input Readers, Reader Factory and Pair Adapter
 *
 * Files are written to a fresh directory under the OS temp dir and removed
 * afterwards. The XLSX fixture is produced with exceljs itself.
 */
import { InputReaderFactory } from '@application/factories/InputReaderFactory';
import { CsvInputReader, parseCsvText } from '@infrastructure/input/CsvInputReader';
import { detectColumns, GeohashPairAdapter } from '@infrastructure/input/GeohashPairAdapter';
import { XlsxInputReader } from '@infrastructure/input/XlsxInputReader';
import { InputFormatError } from '@shared/errors/AppError';
import { Workbook } from 'exceljs';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'route-compare-input-'));
});

afterEach(async () => {
  await fs.rm(tempDir, { recursive: true, force: true });
});

describe('parseCsvText()', () => {
  it('should read headers and rows, skipping blank lines', () => {
    const input = parseCsvText('CX_GH,RX_GH\n9q8yy9mur,9q8yy9mvr\n\ndr5regw3p,dr5regy6r\n');

    expect(input).toEqual({
      headers: ['CX_GH', 'RX_GH'],
      rows: [
        { CX_GH: '9q8yy9mur', RX_GH: '9q8yy9mvr' },
        { CX_GH: 'dr5regw3p', RX_GH: 'dr5regy6r' },
      ],
    });
  });

  it('should trim header names', () => {
    expect(parseCsvText(' CX_GH , RX_GH \na,b\n').headers).toEqual(['CX_GH', 'RX_GH']);
  });

  it('should keep the headers of a file without data rows', () => {
    expect(parseCsvText('customer_geohash,restaurant_geohash\n')).toEqual({
      headers: ['customer_geohash', 'restaurant_geohash'],
      rows: [],
    });
  });

  it('should keep a short row so its missing cell fails on its own', () => {
    const input = parseCsvText('CX_GH,RX_GH\n9q8yy9mur,9q8yy9mvr\n9q8yy9mur\ndr5regw3p,dr5regy6r\n');

    expect(new GeohashPairAdapter().toPairs(input)).toEqual([
      { customerGeohash: '9q8yy9mur', restaurantGeohash: '9q8yy9mvr' },
      { customerGeohash: '9q8yy9mur', restaurantGeohash: '' },
      { customerGeohash: 'dr5regw3p', restaurantGeohash: 'dr5regy6r' },
    ]);
  });

  it('should ignore extra cells on a row', () => {
    const input = parseCsvText('CX_GH,RX_GH\n9q8yy9mur,9q8yy9mvr,\ndr5regw3p,dr5regy6r\n');

    expect(new GeohashPairAdapter().toPairs(input)).toEqual([
      { customerGeohash: '9q8yy9mur', restaurantGeohash: '9q8yy9mvr' },
      { customerGeohash: 'dr5regw3p', restaurantGeohash: 'dr5regy6r' },
    ]);
  });

  it('should reject an unterminated quote', () => {
    expect(() => parseCsvText('CX_GH,RX_GH\n"a,b\n')).toThrow(InputFormatError);
  });
});

describe('CsvInputReader', () => {
  it('should strip a leading byte-order mark', async () => {
    const filePath = path.join(tempDir, 'pairs.csv');
    await fs.writeFile(filePath, '\uFEFFCX_GH,RX_GH\n9q8yy9mur,9q8yy9mvr\n', 'utf-8');

    const input = await new CsvInputReader().read(filePath);

    expect(input.headers).toEqual(['CX_GH', 'RX_GH']);
    expect(input.rows).toEqual([{ CX_GH: '9q8yy9mur', RX_GH: '9q8yy9mvr' }]);
  });
});

describe('XlsxInputReader', () => {
  it('should read the first worksheet with row 1 as the header', async () => {
    const filePath = path.join(tempDir, 'pairs.xlsx');
    const workbook = new Workbook();
    const sheet = workbook.addWorksheet('Pairs');
    sheet.addRow(['customer_geohash', 'restaurant_geohash', 'note']);
    sheet.addRow(['9q8yy9mur', '9q8yy9mvr', 'first']);
    sheet.addRow([]);
    sheet.addRow(['dr5regw3p', 'dr5regy6r', 42]);
    workbook.addWorksheet('Ignored').addRow(['CX_GH', 'RX_GH']);
    await workbook.xlsx.writeFile(filePath);

    const input = await new XlsxInputReader().read(filePath);

    expect(input).toEqual({
      headers: ['customer_geohash', 'restaurant_geohash', 'note'],
      rows: [
        { customer_geohash: '9q8yy9mur', restaurant_geohash: '9q8yy9mvr', note: 'first' },
        { customer_geohash: 'dr5regw3p', restaurant_geohash: 'dr5regy6r', note: '42' },
      ],
    });
  });

  it('should report a file that is not a workbook as an input format error', async () => {
    const filePath = path.join(tempDir, 'broken.xlsx');
    await fs.writeFile(filePath, 'CX_GH,RX_GH\n9q8yy9mur,9q8yy9mvr\n', 'utf-8');

    const attempt = new XlsxInputReader().read(filePath);

    await expect(attempt).rejects.toThrow(InputFormatError);
    await expect(attempt).rejects.toThrow(`Cannot read workbook ${filePath}: `);
  });
});

describe('InputReaderFactory', () => {
  const factory = new InputReaderFactory();

  it.each([
    ['pairs.csv', CsvInputReader],
    ['PAIRS.CSV', CsvInputReader],
    ['pairs.txt', CsvInputReader],
    ['pairs.xlsx', XlsxInputReader],
  ])('should pick a reader for %s', (fileName, readerClass) => {
    expect(factory.create(fileName)).toBeInstanceOf(readerClass);
  });

  it('should refuse legacy .xls workbooks', () => {
    expect(() => factory.create('/data/pairs.xls')).toThrow(
      'Legacy .xls workbooks are not supported; save pairs.xls as .xlsx',
    );
  });

  it('should refuse unknown extensions', () => {
    expect(() => factory.create('pairs.json')).toThrow(
      'Unsupported input file type ".json"; expected .csv or .xlsx',
    );
    expect(() => factory.create('pairs')).toThrow('Unsupported input file type "(none)"');
  });
});

describe('detectColumns()', () => {
  it('should recognise each naming convention', () => {
    expect(detectColumns(['CX_GH', 'RX_GH'])).toEqual({ customer: 'CX_GH', restaurant: 'RX_GH' });
    expect(detectColumns(['id', 'customer_geohash', 'restaurant_geohash'])).toEqual({
      customer: 'customer_geohash',
      restaurant: 'restaurant_geohash',
    });
    expect(detectColumns(['cx_geohash', 'rx_geohash'])).toEqual({
      customer: 'cx_geohash',
      restaurant: 'rx_geohash',
    });
  });

  it('should match case-insensitively and keep the original header name', () => {
    expect(detectColumns(['Cx_Gh', 'rx_gh'])).toEqual({ customer: 'Cx_Gh', restaurant: 'rx_gh' });
  });

  it('should prefer the earlier convention when several are present', () => {
    expect(detectColumns(['cx_geohash', 'rx_geohash', 'CX_GH', 'RX_GH'])).toEqual({
      customer: 'CX_GH',
      restaurant: 'RX_GH',
    });
  });

  it('should require both columns of a convention', () => {
    expect(() => detectColumns(['CX_GH', 'restaurant_geohash'])).toThrow(InputFormatError);
  });

  it('should list the expected and found columns', () => {
    expect(() => detectColumns(['lat', 'lng'])).toThrow(
      'No recognised geohash columns. Expected one of {CX_GH, RX_GH} | ' +
        '{customer_geohash, restaurant_geohash} | {cx_geohash, rx_geohash}; found [lat, lng]',
    );
  });
});

describe('GeohashPairAdapter', () => {
  it('should map rows to trimmed pairs', () => {
    const pairs = new GeohashPairAdapter().toPairs({
      headers: ['CX_GH', 'RX_GH'],
      rows: [
        { CX_GH: ' 9q8yy9mur ', RX_GH: '9q8yy9mvr' },
        { CX_GH: 'dr5regw3p' },
      ],
    });

    expect(pairs).toEqual([
      { customerGeohash: '9q8yy9mur', restaurantGeohash: '9q8yy9mvr' },
      { customerGeohash: 'dr5regw3p', restaurantGeohash: '' },
    ]);
  });

  it('should return no pairs for a header-only input', () => {
    expect(new GeohashPairAdapter().toPairs({ headers: ['CX_GH', 'RX_GH'], rows: [] })).toEqual([]);
  });
});
