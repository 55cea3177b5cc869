import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';

import initSqlJs from 'sql.js';

import { SourceUnavailableError } from '@engines/errors';
import { MaterializedTableEngine } from '@engines/materialized-table-engine';
import {
  CellValue,
  ColumnAggregateType,
  DataRow,
  PageRequest,
  PageResult,
  RowCountOptions,
  Schema,
  SourceKind,
  TabularSource,
} from '@models/tabular-source';
import { isSortableType } from '@utils/column-types';
import { BaseSource, BaseSourceOptions } from '@sources/base-source';

export function createTempDir(): string {
  return mkdtempSync(path.join(tmpdir(), 'tabular-pager-'));
}

export function removeDir(dirPath: string): void {
  rmSync(dirPath, { recursive: true, force: true });
}

/**
 * Runs the statements on a new in-memory database and returns its image.
 */
export async function createSqliteImage(sql: string): Promise<Uint8Array> {
  const SQL = await initSqlJs();
  const db = new SQL.Database();

  try {
    db.exec(sql);
    return db.export();
  } finally {
    db.close();
  }
}

export async function writeSqliteFile(file: string, sql: string): Promise<void> {
  writeFileSync(file, await createSqliteImage(sql));
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Resolves after every pending microtask has run.
 */
export const flushMicrotasks = (): Promise<void> =>
  new Promise((resolve) => {
    setImmediate(resolve);
  });

export type Deferred<T> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: Error) => void;
};

export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function pageRequest(
  source: Pick<TabularSource, 'id'>,
  overrides: Partial<Omit<PageRequest, 'sourceId'>> = {},
): PageRequest {
  return {
    sourceId: source.id,
    sort: null,
    pageIndex: 0,
    pageSize: 10,
    searchQuery: null,
    ...overrides,
  };
}

export function emptyResult(request: PageRequest): PageResult {
  return { request, schema: [], rows: [], totalRowCount: 0, rowOffset: 0 };
}

export const FAKE_SCHEMA: Schema = [
  { name: 'id', declaredType: 'INTEGER', type: 'numeric', index: 0 },
  { name: 'name', declaredType: 'TEXT', type: 'text', index: 1 },
  { name: 'payload', declaredType: 'BLOB', type: 'blob', index: 2 },
];

/**
 * Rows `[i, "name-000i", <bytes>]` for `i` in `[0, count)`.
 */
export function makeFakeRows(count: number): DataRow[] {
  return Array.from({ length: count }, (_, i) => [
    i,
    `name-${String(i).padStart(4, '0')}`,
    new Uint8Array([i % 256]),
  ]);
}

export interface FakeSourceOptions extends BaseSourceOptions {
  rowCount?: number;
  kind?: SourceKind;
  /**
   * Extra latency of `fetchPage` per request. The data is read before
   * waiting and the abort signal is ignored, like a call that can't be
   * interrupted.
   */
  fetchDelayMs?: (request: PageRequest) => number;
}

/**
 * In-memory source with scripted latency and failures. Runs its table
 * engine on the calling thread.
 */
export class FakeSource extends BaseSource implements TabularSource {
  public readonly kind: SourceKind;
  public rows: DataRow[];
  public readonly fetchRequests: PageRequest[] = [];
  public loadCount = 0;
  public rowCountCalls = 0;

  private readonly fetchDelayMs?: (request: PageRequest) => number;
  private readonly failures: Error[] = [];
  private engine: MaterializedTableEngine | null = null;

  constructor(options: FakeSourceOptions = {}) {
    super('fake', options);
    this.kind = options.kind ?? 'table';
    this.rows = makeFakeRows(options.rowCount ?? 0);
    this.fetchDelayMs = options.fetchDelayMs;
  }

  failNextFetch(error: Error): void {
    this.failures.push(error);
  }

  async open(signal?: AbortSignal): Promise<Schema> {
    return this.runOperation('open', signal, async () => this.load().schema);
  }

  schema(): Schema {
    return this.requireEngine('schema').schema;
  }

  canSort(columnIndex: number): boolean {
    const column = this.engine?.schema[columnIndex];
    return column !== undefined && isSortableType(column.type);
  }

  async rowCount(options: RowCountOptions = {}): Promise<number> {
    this.rowCountCalls += 1;
    return this.runOperation('row count', options.signal, async () =>
      this.requireEngine('row count').rowCount(options.searchQuery ?? null),
    );
  }

  async fetchPage(request: PageRequest): Promise<PageResult> {
    this.fetchRequests.push(request);
    const failure = this.failures.shift();

    if (failure) {
      await this.delay(request);
      throw failure;
    }

    const result = await this.runOperation('fetch page', undefined, async () =>
      this.requireEngine('fetch page').fetchPage(request),
    );
    await this.delay(request);
    return result;
  }

  async getColumnAggregate(
    columnIndex: number,
    aggType: ColumnAggregateType,
    options: RowCountOptions = {},
  ): Promise<CellValue> {
    return this.runOperation('column aggregate', options.signal, async () =>
      this.requireEngine('column aggregate').aggregate(columnIndex, aggType, options.searchQuery ?? null),
    );
  }

  async refresh(signal?: AbortSignal): Promise<Schema> {
    const schema = await this.runOperation('refresh', signal, async () => {
      this.engine = null;
      return this.load().schema;
    });
    this.notifyMutated('reload');
    return schema;
  }

  protected async release(): Promise<void> {
    this.engine?.close();
    this.engine = null;
  }

  private load(): MaterializedTableEngine {
    if (!this.engine) {
      this.loadCount += 1;
      this.engine = new MaterializedTableEngine({
        schema: FAKE_SCHEMA,
        rows: this.rows.map((row) => row.slice()),
      });
    }
    return this.engine;
  }

  private requireEngine(operation: string): MaterializedTableEngine {
    this.assertOpen(operation);

    if (!this.engine) {
      throw new SourceUnavailableError(`Source "${this.label}" is not open`, { sourceId: this.id, operation });
    }
    return this.engine;
  }

  private async delay(request: PageRequest): Promise<void> {
    const ms = this.fetchDelayMs?.(request) ?? 0;
    if (ms > 0) {
      await sleep(ms);
    }
  }
}
