import { extname } from 'path';

import { SOURCE } from '../config/constants';
import { DebugLogger } from '../engines/debug-logger';
import { SourceUnavailableError, toTabularSourceError } from '../engines/errors';
import { SourceKind, TabularSource } from '../models/tabular-source';
import { DelimitedFileSource } from './delimited-file-source';
import { getSharedSourceTaskPool, runSourceTask, SourceTaskPool } from './source-task-pool';
import { SpreadsheetSource } from './spreadsheet-source';
import { SqliteTableSource } from './sqlite-table-source';
import { WorkerSourceOptions } from './worker-source';

/**
 * An opened data file and the tabular sources it holds: the tables of a
 * database, the sheets of a workbook or the single table of a CSV file.
 */
export interface DataFile {
  readonly path: string;
  readonly kind: SourceKind;
  /**
   * Table or sheet names. A delimited file has exactly one entry.
   */
  listTables(): Promise<string[]>;
  /**
   * Creates a source for one table. Defaults to the first listed one.
   */
  createSource(name?: string, options?: WorkerSourceOptions): Promise<TabularSource>;
  close(): Promise<void>;
}

export interface OpenDataFileOptions {
  /**
   * Worker threads shared by the file and its sources. Defaults to the
   * shared pool.
   */
  pool?: SourceTaskPool;
  /**
   * Deadline of listing tables and of every call on the created sources.
   */
  timeoutMs?: number;
  logger?: DebugLogger;
}

const hasExtension = (extensions: readonly string[], extension: string): boolean =>
  extensions.some((candidate) => candidate === extension);

/**
 * Detects the kind of source from a file extension.
 *
 * @returns `null` for unsupported files
 */
export function detectDataFileKind(path: string): SourceKind | null {
  const extension = extname(path).toLowerCase();

  if (hasExtension(SOURCE.TABLE_EXTENSIONS, extension)) return 'table';
  if (hasExtension(SOURCE.SPREADSHEET_EXTENSIONS, extension)) return 'spreadsheet';
  if (hasExtension(SOURCE.DELIMITED_EXTENSIONS, extension)) return 'delimited-file';

  return null;
}

function resolveName(tables: readonly string[], name: string | undefined, path: string): string {
  const resolved = name ?? tables[0];

  if (resolved === undefined || !tables.includes(resolved)) {
    throw new SourceUnavailableError(
      resolved === undefined ? `"${path}" holds no tables` : `"${path}" has no table "${resolved}"`,
      { operation: 'create source' },
    );
  }

  return resolved;
}

abstract class WorkerDataFile<TSource extends TabularSource> implements DataFile {
  public abstract readonly kind: SourceKind;
  protected readonly sources: TSource[] = [];
  protected readonly pool: SourceTaskPool;

  constructor(
    public readonly path: string,
    protected readonly options: OpenDataFileOptions,
  ) {
    this.pool = options.pool ?? getSharedSourceTaskPool();
  }

  abstract listTables(): Promise<string[]>;

  protected abstract build(name: string, options: WorkerSourceOptions): TSource;

  async createSource(name?: string, options: WorkerSourceOptions = {}): Promise<TabularSource> {
    const resolved = resolveName(await this.listTables(), name, this.path);
    const source = this.build(resolved, {
      timeoutMs: this.options.timeoutMs,
      logger: this.options.logger,
      ...options,
      pool: options.pool ?? this.pool,
    });
    this.sources.push(source);
    return source;
  }

  async close(): Promise<void> {
    await Promise.all(this.sources.map((source) => source.close()));
  }

  protected listOnWorker(kind: 'table' | 'spreadsheet'): Promise<string[]> {
    return runSourceTask(
      this.pool,
      { type: 'listTables', kind, content: { path: this.path } },
      { timeoutMs: this.options.timeoutMs, details: { operation: 'list tables' } },
    );
  }
}

class SqliteDataFile extends WorkerDataFile<SqliteTableSource> {
  public readonly kind: SourceKind = 'table';

  async listTables(): Promise<string[]> {
    return this.listOnWorker('table');
  }

  protected build(tableName: string, options: WorkerSourceOptions): SqliteTableSource {
    return new SqliteTableSource({ ...options, path: this.path, tableName });
  }
}

class SpreadsheetDataFile extends WorkerDataFile<SpreadsheetSource> {
  public readonly kind: SourceKind = 'spreadsheet';

  async listTables(): Promise<string[]> {
    return this.listOnWorker('spreadsheet');
  }

  protected build(sheetName: string, options: WorkerSourceOptions): SpreadsheetSource {
    return new SpreadsheetSource({ label: sheetName, ...options, path: this.path, sheetName });
  }
}

class DelimitedDataFile extends WorkerDataFile<DelimitedFileSource> {
  public readonly kind: SourceKind = 'delimited-file';

  async listTables(): Promise<string[]> {
    return ['data'];
  }

  protected build(_name: string, options: WorkerSourceOptions): DelimitedFileSource {
    return new DelimitedFileSource({ ...options, path: this.path });
  }
}

/**
 * Opens a data file by extension. A database is checked by listing its
 * tables once.
 *
 * @throws SourceUnavailableError if the extension is not supported or the
 *         file can't be opened
 */
export async function openDataFile(path: string, options: OpenDataFileOptions = {}): Promise<DataFile> {
  const kind = detectDataFileKind(path);

  switch (kind) {
    case 'table': {
      const file = new SqliteDataFile(path, options);
      try {
        await file.listTables();
      } catch (error) {
        throw toTabularSourceError(error, { operation: 'open data file' });
      }
      return file;
    }
    case 'spreadsheet':
      return new SpreadsheetDataFile(path, options);
    case 'delimited-file':
      return new DelimitedDataFile(path, options);
    case null:
      throw new SourceUnavailableError(`Unsupported file type: "${extname(path) || path}"`, {
        operation: 'open data file',
      });
    default: {
      const _: never = kind;
      return _;
    }
  }
}
