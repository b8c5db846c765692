/**
 * Report Writer — CSV + three-sheet workbook
 * Layer: Infrastructure
 *
 * CSV goes through papaparse's unparse (quoting, "\n" line endings, empty cell
 * for null). The workbook is built with exceljs:
 *
 *   Summary    — Metric/Value rows of the BatchSummary
 *   Full_Data  — the same flat table as the CSV, with text cut to Excel's
 *                32,767-character cell limit (the CSV keeps raw bodies whole)
 *   Statistics — count/excluded/mean/median/max/min/std per diff field
 *
 * Missing parent directories are created. Any failure to write either file is
 * a WriteError: the report is the whole point of the run.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { BatchSummary, DiffStatistics } from '@domain/entities/BatchSummary';
import type { ComparisonRecord } from '@domain/entities/ComparisonRecord';
import type { IReportWriter } from '@domain/interfaces/IReportWriter';
import { DIFF_FIELDS, SHEET_NAMES } from '@shared/constants';
import { WriteError } from '@shared/errors/AppError';
import { Workbook } from 'exceljs';
import fs from 'fs/promises';
import Papa from 'papaparse';
import path from 'path';
import { inject, injectable } from 'tsyringe';

import { REPORT_COLUMNS, type ReportCell, toReportRows } from './reportTable';

export const EXCEL_CELL_TEXT_LIMIT = 32767;

export function fitCell(cell: ReportCell): ReportCell {
  return typeof cell === 'string' && cell.length > EXCEL_CELL_TEXT_LIMIT
    ? cell.slice(0, EXCEL_CELL_TEXT_LIMIT)
    : cell;
}

export const STATISTICS_COLUMNS = [
  'Metric',
  'Count',
  'Excluded',
  'Mean',
  'Median',
  'Max',
  'Min',
  'Std',
] as const;

/** Metric/Value pairs for the Summary sheet, in display order. */
export function summaryRows(summary: BatchSummary): [string, ReportCell][] {
  const rows: [string, ReportCell][] = [
    ['total_rows', summary.totalRows],
    ['both_succeeded', summary.bothSucceeded],
    ['row_errors', summary.rowErrors],
    ['directions_failures', summary.directionsFailures],
    ['routes_failures', summary.routesFailures],
    ['directions_faster', summary.fasterProvider.directions],
    ['routes_faster', summary.fasterProvider.routes],
    ['faster_tie', summary.fasterProvider.tie],
  ];
  for (const field of DIFF_FIELDS) {
    const stats = summary.diffs[field];
    rows.push(
      [`${field}_count`, stats.count],
      [`${field}_excluded`, stats.excluded],
      [`${field}_mean`, stats.mean],
      [`${field}_median`, stats.median],
      [`${field}_max`, stats.max],
    );
  }
  return rows;
}

export function statisticsRows(summary: BatchSummary): ReportCell[][] {
  return DIFF_FIELDS.map((field) => {
    const stats: DiffStatistics = summary.diffs[field];
    return [
      field,
      stats.count,
      stats.excluded,
      stats.mean,
      stats.median,
      stats.max,
      stats.min,
      stats.std,
    ];
  });
}

export function toCsv(records: readonly ComparisonRecord[]): string {
  return (
    Papa.unparse({ fields: [...REPORT_COLUMNS], data: toReportRows(records) }, { newline: '\n' }) +
    '\n'
  );
}

export function buildWorkbook(
  records: readonly ComparisonRecord[],
  summary: BatchSummary,
): Workbook {
  const workbook = new Workbook();

  const summarySheet = workbook.addWorksheet(SHEET_NAMES.SUMMARY);
  summarySheet.columns = [
    { header: 'Metric', key: 'metric', width: 34 },
    { header: 'Value', key: 'value', width: 18 },
  ];
  for (const [metric, value] of summaryRows(summary)) {
    summarySheet.addRow([metric, value]);
  }

  const dataSheet = workbook.addWorksheet(SHEET_NAMES.FULL_DATA);
  dataSheet.addRow([...REPORT_COLUMNS]);
  dataSheet.addRows(toReportRows(records).map((row) => row.map(fitCell)));
  dataSheet.getRow(1).font = { bold: true };
  dataSheet.views = [{ state: 'frozen', ySplit: 1 }];

  const statisticsSheet = workbook.addWorksheet(SHEET_NAMES.STATISTICS);
  statisticsSheet.addRow([...STATISTICS_COLUMNS]);
  statisticsSheet.addRows(statisticsRows(summary));
  statisticsSheet.getRow(1).font = { bold: true };

  return workbook;
}

@injectable()
export class ReportWriter implements IReportWriter {
  constructor(@inject(TOKENS.Logger) private log: Logger) {}

  async write(
    records: readonly ComparisonRecord[],
    summary: BatchSummary,
    csvPath: string,
    workbookPath: string,
  ): Promise<void> {
    await this.writeTarget(csvPath, (target) => fs.writeFile(target, toCsv(records), 'utf-8'));
    await this.writeTarget(workbookPath, (target) =>
      buildWorkbook(records, summary).xlsx.writeFile(target),
    );
    this.log.info({ csvPath, workbookPath, rows: records.length }, 'Report written');
  }

  private async writeTarget(
    target: string,
    writeFile: (target: string) => Promise<void>,
  ): Promise<void> {
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await writeFile(target);
    } catch (err) {
      throw new WriteError(target, err instanceof Error ? err.message : String(err));
    }
  }
}
