import { basename } from 'path';

import { SourceKind } from '../models/tabular-source';
import { throwIfAborted } from '../utils/abort';
import type { OpenResult, TableDescriptor } from '../workers/source-worker';
import { SourceData, toSharedContent, WorkerSource, WorkerSourceOptions } from './worker-source';

export interface DelimitedFileSourceOptions extends WorkerSourceOptions {
  /**
   * File to read. Either `path` or `load` must be given.
   */
  path?: string;
  /**
   * Custom loader for the raw text, e.g. an upload kept in memory. Called
   * again on every refresh.
   */
  load?: () => Promise<SourceData>;
  /**
   * Field delimiter. Detected from the header record when omitted.
   */
  delimiter?: string;
}

/**
 * CSV/TSV file with a header record. Column types are inferred from the
 * values: a column is numeric, boolean or temporal only if every non-empty
 * value parses as such. An empty file has no columns and no rows.
 */
export class DelimitedFileSource extends WorkerSource {
  public readonly kind: SourceKind = 'delimited-file';

  private readonly path?: string;
  private readonly loader?: () => Promise<SourceData>;
  private readonly delimiter?: string;
  private detectedDelimiter: string | null = null;

  constructor(options: DelimitedFileSourceOptions) {
    super(options.path ? basename(options.path) : 'delimited file', options);

    if (!options.path && !options.load) {
      throw new TypeError('A delimited file source needs either a path or a loader');
    }

    this.path = options.path;
    this.loader = options.load;
    this.delimiter = options.delimiter;
  }

  /**
   * The delimiter in use, once the file has been read.
   */
  get fieldDelimiter(): string | null {
    return this.delimiter ?? this.detectedDelimiter;
  }

  protected async describe(signal?: AbortSignal): Promise<TableDescriptor> {
    if (this.path) {
      return { kind: 'delimited-file', content: { path: this.path }, delimiter: this.delimiter };
    }

    if (!this.loader) {
      throw new TypeError('A delimited file source needs either a path or a loader');
    }

    const data = await this.loader();
    throwIfAborted(signal, `loading "${this.label}"`);
    return { kind: 'delimited-file', content: toSharedContent(data), delimiter: this.delimiter };
  }

  protected onOpened(result: OpenResult): void {
    this.detectedDelimiter = result.delimiter ?? null;
  }
}
