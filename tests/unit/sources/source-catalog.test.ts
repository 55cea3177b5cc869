import { writeFileSync } from 'fs';
import path from 'path';

import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { DebugLogger } from '@engines/debug-logger';
import { SourceTimeoutError, SourceUnavailableError } from '@engines/errors';
import { detectDataFileKind, openDataFile } from '@sources/source-catalog';
import { createSourceTaskPool, SourceTaskPool } from '@sources/source-task-pool';
import { createTempDir, pageRequest, removeDir, writeSqliteFile } from '@tests/utils';
import * as XLSX from 'xlsx';

const logger = new DebugLogger({ enabled: false });

describe('detectDataFileKind', () => {
  it('detects the kind from the extension', () => {
    expect(detectDataFileKind('/data/DATA.SQLITE')).toBe('table');
    expect(detectDataFileKind('report.xlsx')).toBe('spreadsheet');
    expect(detectDataFileKind('export.tsv')).toBe('delimited-file');
    expect(detectDataFileKind('config.json')).toBeNull();
    expect(detectDataFileKind('README')).toBeNull();
  });
});

describe('openDataFile', () => {
  let dir: string;
  let pool: SourceTaskPool;

  beforeEach(() => {
    dir = createTempDir();
    pool = createSourceTaskPool({ maxConcurrency: 2, logger });
  });

  afterEach(async () => {
    await pool.close();
    removeDir(dir);
  });

  it('rejects unsupported files', async () => {
    await expect(openDataFile(path.join(dir, 'config.json'), { pool })).rejects.toThrow(
      'Unsupported file type: ".json"',
    );
  });

  it('lists the tables of a database', async () => {
    const file = path.join(dir, 'shop.db');
    await writeSqliteFile(
      file,
      `
      CREATE TABLE zeta (id INTEGER);
      CREATE TABLE alpha (id INTEGER PRIMARY KEY AUTOINCREMENT, label TEXT);
      INSERT INTO alpha (label) VALUES ('first'), ('second');
    `,
    );

    const dataFile = await openDataFile(file, { pool, logger });
    expect(dataFile.kind).toBe('table');
    expect(await dataFile.listTables()).toEqual(['alpha', 'zeta']);

    const source = await dataFile.createSource();
    await source.open();
    expect(source.label).toBe('alpha');
    expect(await source.rowCount()).toBe(2);

    await expect(dataFile.createSource('missing')).rejects.toThrow(
      `"${file}" has no table "missing"`,
    );

    await dataFile.close();
    expect(source.closed).toBe(true);
  });

  it('fails for a missing database file', async () => {
    await expect(openDataFile(path.join(dir, 'missing.db'), { pool })).rejects.toBeInstanceOf(
      SourceUnavailableError,
    );
  });

  it('exposes a delimited file as a single table', async () => {
    const file = path.join(dir, 'pairs.csv');
    writeFileSync(file, 'a;b\n1;2\n');

    const dataFile = await openDataFile(file, { pool, logger });
    expect(await dataFile.listTables()).toEqual(['data']);

    const source = await dataFile.createSource('data');
    await source.open();
    const { rows } = await source.fetchPage(pageRequest(source));

    expect(rows).toEqual([[1, 2]]);
    await dataFile.close();
  });

  it('exposes every sheet of a workbook', async () => {
    const file = path.join(dir, 'book.xlsx');
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([['n'], [1], [2]]), 'First');
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([['m'], [3]]), 'Second');
    writeFileSync(file, XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' }));

    const dataFile = await openDataFile(file, { pool, logger });
    expect(await dataFile.listTables()).toEqual(['First', 'Second']);

    const source = await dataFile.createSource('Second');
    await source.open();
    expect(source.label).toBe('Second');
    expect(await source.getColumnAggregate(0, 'sum')).toBe(3);

    await dataFile.close();
  });

  it('applies its deadline to the sources it creates', async () => {
    const file = path.join(dir, 'counter.db');
    await writeSqliteFile(
      file,
      `CREATE VIEW numbers AS
         WITH RECURSIVE c(x) AS (SELECT 1 UNION ALL SELECT x + 1 FROM c WHERE x < 20000000)
         SELECT x FROM c;
       CREATE TABLE warm (id INTEGER);`,
    );
    // Starts the worker thread before the short deadline applies
    await (await openDataFile(file, { pool, logger })).listTables();

    const dataFile = await openDataFile(file, { pool, logger, timeoutMs: 250 });
    const source = await dataFile.createSource('numbers');
    await source.open();

    await expect(source.rowCount()).rejects.toBeInstanceOf(SourceTimeoutError);
    await dataFile.close();
  });
});
