import assert from 'node:assert/strict';
import path from 'node:path';
import { test } from 'node:test';
import { DatasetParseError, DatasetValidationError } from '../analysis/lib/errors.js';
import { createMemoryLogger } from '../analysis/lib/logger.js';
import { loadedRunTables, loadRunTable, loadRunTables } from '../analysis/lib/runLoader.js';
import { loadSummaryOutcome, loadSummaryTable } from '../analysis/lib/summaryLoader.js';
import {
  buildRunCsv,
  buildSummaryCsv,
  createFixtureDir,
  removeFixtureDir,
  RUN_HEADER,
  writeFixtureFile
} from './fixtures.js';

test('a run file loads into a frozen table keyed by its file name', (t) => {
  const dir = createFixtureDir();
  t.after(() => removeFixtureDir(dir));
  const filePath = writeFixtureFile(
    dir,
    'simulation_1_pop10.csv',
    buildRunCsv([
      [0, 10, 5, 5, 0, 0],
      [1, 12, 6, 6, 3, 1],
      [2, 9, 4, 5, 0, 3]
    ])
  );

  const table = loadRunTable(filePath);

  assert.equal(table.sourceId, 'simulation_1_pop10.csv');
  assert.equal(table.fileName, 'simulation_1_pop10.csv');
  assert.equal(table.filePath, filePath);
  assert.deepEqual(table.records[1], { period: 1, totalAlive: 12, males: 6, females: 6, births: 3, deaths: 1 });
  assert.equal(table.records.length, 3);
  assert.ok(Object.isFrozen(table), 'Expected run table to be frozen');
  assert.ok(Object.isFrozen(table.records), 'Expected run records to be frozen');
});

test('columns are matched by header name, not position', (t) => {
  const dir = createFixtureDir();
  t.after(() => removeFixtureDir(dir));
  const filePath = writeFixtureFile(
    dir,
    'simulation_1_pop10.csv',
    'Deaths,Births,Females,Males,Total_Alive,Month,Notes\n1,3,5,4,9,0,warm start\n'
  );

  const table = loadRunTable(filePath);

  assert.deepEqual(table.records, [{ period: 0, totalAlive: 9, males: 4, females: 5, births: 3, deaths: 1 }]);
});

test('males plus females not matching the total is kept as written', (t) => {
  const dir = createFixtureDir();
  t.after(() => removeFixtureDir(dir));
  const filePath = writeFixtureFile(dir, 'simulation_1_pop10.csv', buildRunCsv([[0, 10, 3, 3, 0, 0]]));

  const table = loadRunTable(filePath);

  assert.deepEqual(table.records[0], { period: 0, totalAlive: 10, males: 3, females: 3, births: 0, deaths: 0 });
});

test('missing columns are reported together', (t) => {
  const dir = createFixtureDir();
  t.after(() => removeFixtureDir(dir));
  const filePath = writeFixtureFile(dir, 'simulation_1_pop10.csv', 'Month,Total_Alive,Males,Females\n0,10,5,5\n');

  assert.throws(
    () => loadRunTable(filePath),
    (error: unknown) => {
      assert.ok(error instanceof DatasetValidationError);
      assert.equal(error.fileName, 'simulation_1_pop10.csv');
      assert.deepEqual(error.missingColumns, ['Births', 'Deaths']);
      assert.deepEqual(error.invalidCells, []);
      assert.equal(error.message, 'Missing required columns: Births, Deaths');
      return true;
    }
  );
});

test('every mis-typed or absent cell is listed with its row and column', (t) => {
  const dir = createFixtureDir();
  t.after(() => removeFixtureDir(dir));
  const filePath = writeFixtureFile(
    dir,
    'simulation_1_pop10.csv',
    [RUN_HEADER, '0,10,5,5,0,0', '1,abc,6,6,2,0', '2,1.5,4,5,0,-3', '3,9,4,5'].join('\n')
  );

  assert.throws(
    () => loadRunTable(filePath),
    (error: unknown) => {
      assert.ok(error instanceof DatasetValidationError);
      assert.deepEqual(error.missingColumns, []);
      assert.deepEqual(error.invalidCells, [
        { row: 2, column: 'Total_Alive', value: 'abc', message: 'not a number' },
        { row: 3, column: 'Total_Alive', value: '1.5', message: 'not an integer' },
        { row: 3, column: 'Deaths', value: '-3', message: 'must be zero or positive' },
        { row: 4, column: 'Births', value: '', message: 'value is missing' },
        { row: 4, column: 'Deaths', value: '', message: 'value is missing' }
      ]);
      assert.ok(error.message.startsWith('Invalid cells: row 2 Total_Alive="abc" (not a number); '));
      return true;
    }
  );
});

test('hex, binary and exponent notation are mis-typed cells', (t) => {
  const dir = createFixtureDir();
  t.after(() => removeFixtureDir(dir));
  const filePath = writeFixtureFile(
    dir,
    'simulation_1_pop10.csv',
    [RUN_HEADER, '0,0x10,0b1,1e1,0,0', '1,+4,2,2,0,0'].join('\n')
  );

  assert.throws(
    () => loadRunTable(filePath),
    (error: unknown) => {
      assert.ok(error instanceof DatasetValidationError);
      assert.deepEqual(error.invalidCells, [
        { row: 1, column: 'Total_Alive', value: '0x10', message: 'not a number' },
        { row: 1, column: 'Males', value: '0b1', message: 'not a number' },
        { row: 1, column: 'Females', value: '1e1', message: 'not a number' }
      ]);
      return true;
    }
  );
});

test('an empty file is a parse error', (t) => {
  const dir = createFixtureDir();
  t.after(() => removeFixtureDir(dir));
  const filePath = writeFixtureFile(dir, 'simulation_1_pop10.csv', '\n\n');

  assert.throws(() => loadRunTable(filePath), (error: unknown) => {
    assert.ok(error instanceof DatasetParseError);
    assert.equal(error.message, 'File is empty.');
    return true;
  });
});

test('a header without rows loads as an empty table', (t) => {
  const dir = createFixtureDir();
  t.after(() => removeFixtureDir(dir));
  const filePath = writeFixtureFile(dir, 'simulation_1_pop10.csv', `${RUN_HEADER}\n`);

  assert.deepEqual(loadRunTable(filePath).records, []);
});

test('one malformed run file among valid ones is skipped and logged once', (t) => {
  const dir = createFixtureDir();
  t.after(() => removeFixtureDir(dir));
  const first = writeFixtureFile(dir, 'simulation_1_pop10.csv', buildRunCsv([[0, 10, 5, 5, 0, 0], [1, 12, 6, 6, 2, 0]]));
  const broken = writeFixtureFile(dir, 'simulation_2_pop10.csv', 'garbage\n');
  const third = writeFixtureFile(dir, 'simulation_3_pop10.csv', buildRunCsv([[0, 10, 5, 5, 0, 0]]));
  const logger = createMemoryLogger();

  const outcomes = loadRunTables([first, broken, third], logger);

  assert.deepEqual(
    outcomes.map((outcome) => outcome.status),
    ['loaded', 'failed', 'loaded']
  );
  assert.deepEqual(
    loadedRunTables(outcomes).map((table) => table.sourceId),
    ['simulation_1_pop10.csv', 'simulation_3_pop10.csv']
  );
  assert.deepEqual(logger.errors, [
    '[run-loader] Error loading simulation_2_pop10.csv: Missing required columns: Month, Total_Alive, Males, Females, Births, Deaths'
  ]);
  assert.deepEqual(logger.lines, [
    '[run-loader] Loaded: simulation_1_pop10.csv (2 period(s))',
    '[run-loader] Loaded: simulation_3_pop10.csv (1 period(s))'
  ]);

  const failed = outcomes[1];
  assert.equal(failed.status, 'failed');
  if (failed.status === 'failed') {
    assert.equal(failed.fileName, 'simulation_2_pop10.csv');
    assert.deepEqual(failed.missingColumns, ['Month', 'Total_Alive', 'Males', 'Females', 'Births', 'Deaths']);
  }
});

test('an unreadable run path becomes a failed outcome', (t) => {
  const dir = createFixtureDir();
  t.after(() => removeFixtureDir(dir));
  const logger = createMemoryLogger();

  const [outcome] = loadRunTables([path.join(dir, 'simulation_9_pop10.csv')], logger);

  assert.equal(outcome.status, 'failed');
  if (outcome.status === 'failed') {
    assert.ok(outcome.note.startsWith('Failed to read file: '), `Unexpected note: ${outcome.note}`);
  }
  assert.equal(logger.errors.length, 1);
});

test('the summary loader skips the six line preamble', (t) => {
  const dir = createFixtureDir();
  t.after(() => removeFixtureDir(dir));
  const filePath = writeFixtureFile(
    dir,
    'simulation_summary_test.csv',
    buildSummaryCsv([
      [1, 0, 5, 5],
      [2, 40, 24, 0]
    ])
  );

  const table = loadSummaryTable(filePath);

  assert.equal(table.fileName, 'simulation_summary_test.csv');
  assert.deepEqual(table.records, [
    { simNumber: 1, finalAlive: 0, monthsSimulated: 5, extinctionMonth: 5 },
    { simNumber: 2, finalAlive: 40, monthsSimulated: 24, extinctionMonth: 0 }
  ]);
});

test('preamble lines are skipped by count whatever they contain, and extra columns are ignored', (t) => {
  const dir = createFixtureDir();
  t.after(() => removeFixtureDir(dir));
  const filePath = writeFixtureFile(
    dir,
    'simulation_summary_test.csv',
    [
      'Summary generated by run batch',
      'Months,24',
      'Initial,20',
      'Simulations,2',
      'Seed,42',
      '',
      'Sim_Number,Final_Alive,Months_Simulated,Extinction_Month,Mean_Alive',
      '3,12,24,0,10.5'
    ].join('\n')
  );

  assert.deepEqual(loadSummaryTable(filePath).records, [
    { simNumber: 3, finalAlive: 12, monthsSimulated: 24, extinctionMonth: 0 }
  ]);
});

test('a summary that fails to parse is reported and logged, not thrown', (t) => {
  const dir = createFixtureDir();
  t.after(() => removeFixtureDir(dir));
  const filePath = writeFixtureFile(dir, 'simulation_summary_test.csv', buildSummaryCsv([[1, 0, 5, 5]]));
  const logger = createMemoryLogger();

  const outcome = loadSummaryOutcome(filePath, 7, logger);

  assert.equal(outcome.status, 'failed');
  if (outcome.status === 'failed') {
    assert.deepEqual(outcome.missingColumns, ['Sim_Number', 'Final_Alive', 'Months_Simulated', 'Extinction_Month']);
  }
  assert.equal(logger.errors.length, 1);
  assert.ok(logger.errors[0].startsWith('[summary-loader] Error loading summary simulation_summary_test.csv: '));
});

test('no located summary gives a missing outcome', () => {
  const logger = createMemoryLogger();

  const outcome = loadSummaryOutcome(null, 6, logger);

  assert.deepEqual(outcome, { status: 'missing', note: 'No summary dataset found.' });
  assert.deepEqual(logger.lines, ['[summary-loader] No summary dataset found.']);
});
