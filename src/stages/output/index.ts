/**
 * OUTPUT Stage
 * Goal: Rank the surviving businesses and write them in a fixed tabular schema
 */

import * as fs from 'fs';
import * as path from 'path';
import { stringify } from 'csv-stringify/sync';
import { Workbook } from 'exceljs';
import { BaseStage } from '../base-stage';
import type { BusinessRecord } from '../../state/types';
import type { OutputFormat, ProspectorConfig } from '../../config/types';
import { fitTierOrdinal, rankRecords, type TierOrdinal } from '../../icp/rank';
import { logger } from '../../lib/logger';
import { ensureDir } from '../../lib/env';
import { countBy, timestampString, toNumber } from '../../lib/utils';

export const EXPORT_COLUMNS = [
  'place_id',
  'name',
  'address',
  'city',
  'state',
  'keywords',
  'types',
  'rating',
  'website',
  'phone',
  'ai_evaluation',
  'ai_fit_category',
  'ai_reasoning',
  'ai_people_assessment',
  'ai_revenue_assessment',
] as const;

export type ExportColumn = (typeof EXPORT_COLUMNS)[number];
export type ExportRow = Record<ExportColumn, string | number | null>;

function orNull<T>(value: T | null | undefined): T | null {
  return value === undefined || value === '' ? null : value;
}

export function toExportRow(record: BusinessRecord): ExportRow {
  return {
    place_id: orNull(record.placeId),
    name: orNull(record.name),
    address: orNull(record.address),
    city: orNull(record.city),
    state: orNull(record.state),
    keywords: orNull(record.keywordUsed),
    types: orNull(record.categoryTags.join(', ')),
    rating: orNull(record.rating),
    website: orNull(record.website),
    phone: orNull(record.phone),
    ai_evaluation: orNull(record.aiEvaluationText),
    ai_fit_category: orNull(record.aiFitCategory),
    ai_reasoning: orNull(record.aiReasoning),
    ai_people_assessment: orNull(record.aiPeopleAssessment),
    ai_revenue_assessment: orNull(record.aiRevenueAssessment),
  };
}

export function toCsv(rows: ExportRow[]): string {
  return stringify(rows, {
    header: true,
    columns: [...EXPORT_COLUMNS],
  });
}

export const WORKSHEET_NAME = 'Prospects';

export async function writeWorkbook(rows: ExportRow[], filePath: string): Promise<void> {
  const workbook = new Workbook();
  const sheet = workbook.addWorksheet(WORKSHEET_NAME);
  sheet.columns = EXPORT_COLUMNS.map((column) => ({ header: column, key: column }));
  sheet.addRows(rows);
  await workbook.xlsx.writeFile(filePath);
}

function includes(format: OutputFormat, target: 'csv' | 'json' | 'xlsx'): boolean {
  if (format === 'all') return true;
  if (format === 'both') return target !== 'xlsx';
  return format === target;
}

export interface OutputStageOptions {
  tierOf?: TierOrdinal;
  format?: OutputFormat;
  filenamePrefix?: string;
  now?: () => Date;
}

export class OutputStage extends BaseStage {
  private readonly tierOf: TierOrdinal;
  private readonly format: OutputFormat;
  private readonly filenamePrefix: string;
  private readonly now: () => Date;
  private outputFiles: string[] = [];

  constructor(config: ProspectorConfig, options: OutputStageOptions = {}) {
    super('output', config);
    this.tierOf = options.tierOf ?? fitTierOrdinal;
    this.format = options.format ?? config.output.format;
    this.filenamePrefix = options.filenamePrefix ?? config.output.filenamePrefix;
    this.now = options.now ?? (() => new Date());
  }

  getOutputFiles(): string[] {
    return [...this.outputFiles];
  }

  protected async execute(records: BusinessRecord[]): Promise<BusinessRecord[]> {
    this.outputFiles = [];

    if (records.length === 0) {
      logger.info('No companies to save');
      return [];
    }

    const ranked = rankRecords(records, this.tierOf, {
      byTier: this.config.output.sortByFitCategory,
      byRating: this.config.output.sortByRating,
    });
    const rows = ranked.map(toExportRow);

    const outputDir = this.config.output.directory;
    ensureDir(outputDir);
    const filenameBase = `${this.filenamePrefix}_${timestampString(this.now())}`;

    if (includes(this.format, 'csv')) {
      const csvPath = path.join(outputDir, `${filenameBase}.csv`);
      fs.writeFileSync(csvPath, toCsv(rows), 'utf-8');
      this.outputFiles.push(csvPath);
      logger.info(`Wrote CSV: ${csvPath}`, { rows: rows.length });
    }

    if (includes(this.format, 'json')) {
      const jsonPath = path.join(outputDir, `${filenameBase}.json`);
      const document = {
        metadata: {
          exportedAt: this.now().toISOString(),
          runId: this.getRunId(),
          count: rows.length,
        },
        leads: rows,
      };
      fs.writeFileSync(jsonPath, JSON.stringify(document, null, 2), 'utf-8');
      this.outputFiles.push(jsonPath);
      logger.info(`Wrote JSON: ${jsonPath}`, { leads: rows.length });
    }

    if (includes(this.format, 'xlsx')) {
      const xlsxPath = path.join(outputDir, `${filenameBase}.xlsx`);
      await writeWorkbook(rows, xlsxPath);
      this.outputFiles.push(xlsxPath);
      logger.info(`Wrote Excel: ${xlsxPath}`, { rows: rows.length });
    }

    this.processed = ranked.length;
    this.passed = ranked.length;
    this.logSummary(ranked);

    return ranked;
  }

  private logSummary(records: BusinessRecord[]): void {
    const rated = records.filter((r) => r.rating !== null && r.rating !== undefined);
    const averageRating =
      rated.length > 0 ? rated.reduce((sum, r) => sum + toNumber(r.rating), 0) / rated.length : null;

    logger.info('Summary statistics', {
      total: records.length,
      byState: Object.fromEntries(countBy(records, (r) => r.state).slice(0, 10)),
      byKeyword: Object.fromEntries(countBy(records, (r) => r.keywordUsed).slice(0, 10)),
      byFitCategory: Object.fromEntries(countBy(records, (r) => r.fitCategory)),
      byAiFitCategory: Object.fromEntries(countBy(records, (r) => r.aiFitCategory)),
      byRevenue: Object.fromEntries(countBy(records, (r) => r.aiRevenueAssessment)),
      averageRating: averageRating === null ? null : Number(averageRating.toFixed(2)),
    });
  }
}

export { OutputStage as default };
