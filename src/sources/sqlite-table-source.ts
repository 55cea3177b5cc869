import { SourceKind } from '../models/tabular-source';
import type { TableContent, TableDescriptor } from '../workers/source-worker';
import { SourceData, toSharedContent, WorkerSource, WorkerSourceOptions } from './worker-source';

export interface SqliteTableSourceOptions extends WorkerSourceOptions {
  /**
   * Database file. Either `path` or `data` must be given.
   */
  path?: string;
  /**
   * Image of a database kept in memory, e.g. an upload.
   */
  data?: SourceData;
  tableName: string;
}

/**
 * A table or view of an SQLite database. Ordering, filtering, slicing and
 * aggregation all run in the database, on a worker thread.
 */
export class SqliteTableSource extends WorkerSource {
  public readonly kind: SourceKind = 'table';
  public readonly tableName: string;

  private readonly content: TableContent;

  constructor(options: SqliteTableSourceOptions) {
    super(options.tableName, options);

    if (options.path) {
      this.content = { path: options.path };
    } else if (options.data !== undefined) {
      this.content = toSharedContent(options.data);
    } else {
      throw new TypeError('A table source needs either a path or database data');
    }

    this.tableName = options.tableName;
  }

  protected async describe(): Promise<TableDescriptor> {
    return { kind: 'table', content: this.content, tableName: this.tableName };
  }
}
