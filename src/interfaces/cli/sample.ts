/**
 * Sample input for `--create-sample`: a handful of customer/restaurant pairs
 * in the CX_GH/RX_GH convention, enough to try a run end to end.
 */
import fs from 'fs/promises';
import Papa from 'papaparse';
import path from 'path';

export const SAMPLE_PAIRS: readonly [customer: string, restaurant: string][] = [
  ['9q8yy9mur', '9q8yy9mvr'],
  ['9q8yyk8yt', '9q8yyk9pb'],
  ['dr5regw3p', 'dr5regy6r'],
];

export function sampleCsv(): string {
  const data = SAMPLE_PAIRS.map(([customer, restaurant]) => [customer, restaurant]);
  return Papa.unparse({ fields: ['CX_GH', 'RX_GH'], data }, { newline: '\n' }) + '\n';
}

export async function writeSampleInput(filePath: string): Promise<string> {
  const target = path.resolve(filePath);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, sampleCsv(), 'utf-8');
  return target;
}
