import * as fs from 'fs';
import * as path from 'path';
import { describe, it, expect } from 'vitest';
import { Workbook } from 'exceljs';
import { EXPORT_COLUMNS, OutputStage, toCsv, toExportRow, WORKSHEET_NAME } from '../../src/stages/output';
import { aiTierOrdinal } from '../../src/icp/rank';
import { RunContext } from '../../src/state/run-context';
import { business, FIXED_NOW, testConfig } from '../helpers/config';

const acme = () => business({ placeId: 'p1', fitCategory: 'Medium Fit' });
const beta = () =>
  business({
    placeId: 'p2',
    name: 'Beta Instruments',
    address: '9 Elm St',
    city: 'Newark, NJ',
    state: 'NJ',
    categoryTags: ['establishment'],
    rating: 3.9,
    website: 'https://beta.test',
    phone: '555-0100',
    aiEvaluationText: 'High fit overall',
    aiFitCategory: 'High',
    aiReasoning: 'Yes',
    fitCategory: 'High Fit',
  });

describe('toExportRow', () => {
  it('maps record fields to export columns and empties to null', () => {
    const row = toExportRow(business({ website: '', phone: null }));

    expect(Object.keys(row)).toEqual([...EXPORT_COLUMNS]);
    expect(row.types).toBe('establishment, business');
    expect(row.keywords).toBe('medical device');
    expect(row.website).toBeNull();
    expect(row.phone).toBeNull();
    expect(row.ai_fit_category).toBeNull();
  });
});

describe('toCsv', () => {
  it('writes a header and quotes values containing commas', () => {
    const lines = toCsv([toExportRow(acme())]).split('\n');

    expect(lines[0]).toBe(EXPORT_COLUMNS.join(','));
    expect(lines[1]).toBe(
      'p1,Acme Medical Devices,"1 Main St, New York, NY","New York, NY",NY,medical device,"establishment, business",4.2,,,,,,,'
    );
  });
});

describe('OutputStage', () => {
  it('ranks records and writes a timestamped CSV', async () => {
    const config = testConfig();
    const stage = new OutputStage(config, { now: FIXED_NOW });

    const result = await stage.runStage([acme(), beta()], new RunContext());

    const expectedPath = path.join(config.output.directory, 'prospecting_results_20240102_030405.csv');
    expect(stage.getOutputFiles()).toEqual([expectedPath]);
    expect(result.records.map((r) => r.placeId)).toEqual(['p2', 'p1']);

    const lines = fs.readFileSync(expectedPath, 'utf-8').split('\n');
    expect(lines).toHaveLength(4);
    expect(lines[1]).toBe(
      'p2,Beta Instruments,9 Elm St,"Newark, NJ",NJ,medical device,establishment,3.9,https://beta.test,555-0100,High fit overall,High,Yes,,'
    );
    expect(lines[2].startsWith('p1,')).toBe(true);
    expect(lines[3]).toBe('');
  });

  it('writes a JSON document with run metadata', async () => {
    const config = testConfig();
    const run = new RunContext();
    const stage = new OutputStage(config, { format: 'json', filenamePrefix: 'leads', now: FIXED_NOW });

    await stage.runStage([acme(), beta()], run);

    const jsonPath = path.join(config.output.directory, 'leads_20240102_030405.json');
    expect(stage.getOutputFiles()).toEqual([jsonPath]);

    const document = JSON.parse(fs.readFileSync(jsonPath, 'utf-8'));
    expect(document.metadata).toEqual({
      exportedAt: FIXED_NOW().toISOString(),
      runId: run.runId,
      count: 2,
    });
    expect(document.leads[0].place_id).toBe('p2');
    expect(document.leads[1].website).toBeNull();
  });

  it('writes both formats when asked', async () => {
    const config = testConfig();
    const stage = new OutputStage(config, { format: 'both', now: FIXED_NOW });

    await stage.runStage([acme()], new RunContext());

    expect(stage.getOutputFiles().map((file) => path.basename(file))).toEqual([
      'prospecting_results_20240102_030405.csv',
      'prospecting_results_20240102_030405.json',
    ]);
  });

  it('writes an Excel workbook with the export columns', async () => {
    const config = testConfig();
    const stage = new OutputStage(config, { format: 'xlsx', now: FIXED_NOW });

    await stage.runStage([acme(), beta()], new RunContext());

    const xlsxPath = path.join(config.output.directory, 'prospecting_results_20240102_030405.xlsx');
    expect(stage.getOutputFiles()).toEqual([xlsxPath]);

    const workbook = new Workbook();
    await workbook.xlsx.readFile(xlsxPath);
    const sheet = workbook.getWorksheet(WORKSHEET_NAME);
    expect(sheet).toBeDefined();

    const header = EXPORT_COLUMNS.map((_, index) => sheet?.getRow(1).getCell(index + 1).value);
    expect(header).toEqual([...EXPORT_COLUMNS]);
    expect(sheet?.getRow(2).getCell(1).value).toBe('p2');
    expect(sheet?.getRow(3).getCell(2).value).toBe('Acme Medical Devices');
    expect(sheet?.getRow(3).getCell(8).value).toBe(4.2);
    expect(sheet?.rowCount).toBe(3);
  });

  it('writes every format for all', async () => {
    const config = testConfig();
    const stage = new OutputStage(config, { format: 'all', now: FIXED_NOW });

    await stage.runStage([acme()], new RunContext());

    expect(stage.getOutputFiles().map((file) => path.basename(file))).toEqual([
      'prospecting_results_20240102_030405.csv',
      'prospecting_results_20240102_030405.json',
      'prospecting_results_20240102_030405.xlsx',
    ]);
  });

  it('ranks by the chosen tier', async () => {
    const config = testConfig();
    const first = business({ placeId: 'low-ai', aiFitCategory: 'Low', fitCategory: 'High Fit' });
    const second = business({ placeId: 'high-ai', aiFitCategory: 'High', fitCategory: 'Low Fit' });

    const result = await new OutputStage(config, { tierOf: aiTierOrdinal, now: FIXED_NOW }).runStage(
      [first, second],
      new RunContext()
    );

    expect(result.records.map((r) => r.placeId)).toEqual(['high-ai', 'low-ai']);
  });

  it('writes nothing for an empty input', async () => {
    const config = testConfig();
    const stage = new OutputStage(config, { now: FIXED_NOW });

    const result = await stage.runStage([], new RunContext());

    expect(result.records).toEqual([]);
    expect(stage.getOutputFiles()).toEqual([]);
    expect(fs.readdirSync(config.output.directory)).toEqual([]);
  });
});
