import { SourceUnavailableError } from '../engines/errors';
import {
  CellValue,
  ColumnAggregateType,
  PageRequest,
  PageResult,
  RowCountOptions,
  Schema,
  TabularSource,
} from '../models/tabular-source';
import { isSortableType } from '../utils/column-types';
import type {
  OpenResult,
  SessionRef,
  SourceWorkerRequest,
  SourceWorkerResult,
  TableContent,
  TableDescriptor,
} from '../workers/source-worker';
import { BaseSource, BaseSourceOptions } from './base-source';
import { getSharedSourceTaskPool, runSourceTask, SourceTaskPool } from './source-task-pool';

export type SourceData = Uint8Array | ArrayBuffer | string;

export interface WorkerSourceOptions extends BaseSourceOptions {
  /**
   * Worker threads that run this source. Defaults to the shared pool.
   */
  pool?: SourceTaskPool;
}

/**
 * Copies loaded data into shared memory once, so every later request can
 * hand it to a worker thread without cloning it.
 */
export function toSharedContent(data: SourceData): TableContent {
  const bytes =
    typeof data === 'string'
      ? Buffer.from(data, 'utf8')
      : data instanceof Uint8Array
        ? data
        : new Uint8Array(data);

  const shared = new Uint8Array(new SharedArrayBuffer(bytes.byteLength));
  shared.set(bytes);
  return { data: shared };
}

/**
 * Base of all file and database backed sources. The data itself is opened,
 * sorted and sliced by a table engine on a worker thread; this side only
 * describes where the data lives and keeps the schema.
 *
 * Every call carries the session (source id, revision, descriptor), so any
 * thread of the pool can serve it, including one that replaced a thread
 * terminated after a timeout.
 */
export abstract class WorkerSource extends BaseSource implements TabularSource {
  protected readonly pool: SourceTaskPool;

  private session: SessionRef | null = null;
  private columns: Schema | null = null;
  private loading: Promise<OpenResult> | null = null;
  private revision = 0;

  protected constructor(defaultLabel: string, options: WorkerSourceOptions) {
    super(defaultLabel, options);
    this.pool = options.pool ?? getSharedSourceTaskPool();
  }

  /**
   * Resolves where the data lives. Called on open and on every refresh.
   */
  protected abstract describe(signal?: AbortSignal): Promise<TableDescriptor>;

  /**
   * Hook for what the open reply carries beyond the schema.
   */
  protected onOpened(_result: OpenResult): void {}

  async open(signal?: AbortSignal): Promise<Schema> {
    return this.runOperation('open', signal, async () => {
      if (this.columns) {
        return this.columns;
      }
      return (await this.ensureOpen(signal)).schema;
    });
  }

  schema(): Schema {
    this.assertOpen('schema');

    if (!this.columns) {
      throw this.notOpenError('schema');
    }
    return this.columns;
  }

  canSort(columnIndex: number): boolean {
    const column = this.columns?.[columnIndex];
    return column !== undefined && isSortableType(column.type);
  }

  async rowCount(options: RowCountOptions = {}): Promise<number> {
    return this.runOperation('row count', options.signal, () =>
      this.call(
        { type: 'rowCount', session: this.requireSession('row count'), searchQuery: options.searchQuery ?? null },
        'row count',
        options.signal,
      ),
    );
  }

  async fetchPage(request: PageRequest, signal?: AbortSignal): Promise<PageResult> {
    return this.runOperation('fetch page', signal, () =>
      this.call({ type: 'fetchPage', session: this.requireSession('fetch page'), request }, 'fetch page', signal),
    );
  }

  async getColumnAggregate(
    columnIndex: number,
    aggType: ColumnAggregateType,
    options: RowCountOptions = {},
  ): Promise<CellValue> {
    return this.runOperation('column aggregate', options.signal, () =>
      this.call(
        {
          type: 'aggregate',
          session: this.requireSession('column aggregate'),
          columnIndex,
          aggType,
          searchQuery: options.searchQuery ?? null,
        },
        'column aggregate',
        options.signal,
      ),
    );
  }

  async refresh(signal?: AbortSignal): Promise<Schema> {
    const result = await this.runOperation('refresh', signal, () => {
      this.revision += 1;
      this.session = null;
      this.columns = null;
      this.loading = null;
      return this.ensureOpen(signal);
    });

    this.notifyMutated('reload');
    return result.schema;
  }

  protected async release(): Promise<void> {
    const opened = this.session !== null;

    this.session = null;
    this.columns = null;
    this.loading = null;

    if (opened && !this.pool.closed) {
      await this.pool.broadcast({ type: 'release', sessionId: this.id });
    }
  }

  private call<R extends SourceWorkerRequest>(
    request: R,
    operation: string,
    signal?: AbortSignal,
  ): Promise<SourceWorkerResult<R>> {
    return runSourceTask(this.pool, request, {
      signal,
      timeoutMs: this.timeoutMs,
      details: { sourceId: this.id, operation },
    });
  }

  private async ensureOpen(signal?: AbortSignal): Promise<OpenResult> {
    // Concurrent opens share a single load
    if (!this.loading) {
      const revision = this.revision;
      const loading = this.load(revision, signal);
      this.loading = loading;

      try {
        return await loading;
      } finally {
        if (this.loading === loading) {
          this.loading = null;
        }
      }
    }

    return this.loading;
  }

  private async load(revision: number, signal?: AbortSignal): Promise<OpenResult> {
    const session: SessionRef = { id: this.id, revision, descriptor: await this.describe(signal) };
    const result = await this.call({ type: 'open', session }, 'open', signal);

    // A refresh or close meanwhile owns the state now
    if (this.revision === revision && !this.closed) {
      this.session = session;
      this.columns = result.schema;
      this.onOpened(result);
      this.logger.debug('Opened source', {
        sourceId: this.id,
        kind: this.kind,
        columns: result.schema.length,
        revision,
      });
    }

    return result;
  }

  private requireSession(operation: string): SessionRef {
    this.assertOpen(operation);

    if (!this.session) {
      throw this.notOpenError(operation);
    }
    return this.session;
  }

  private notOpenError(operation: string): SourceUnavailableError {
    return new SourceUnavailableError(`Source "${this.label}" is not open`, {
      sourceId: this.id,
      operation,
    });
  }
}
