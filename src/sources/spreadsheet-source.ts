import { basename } from 'path';

import { SourceKind } from '../models/tabular-source';
import { throwIfAborted } from '../utils/abort';
import type { TableDescriptor } from '../workers/source-worker';
import { toSharedContent, WorkerSource, WorkerSourceOptions } from './worker-source';

export type WorkbookData = Uint8Array | ArrayBuffer;

export interface SpreadsheetSourceOptions extends WorkerSourceOptions {
  /**
   * Workbook file. Either `path` or `load` must be given.
   */
  path?: string;
  load?: () => Promise<WorkbookData>;
  sheetName: string;
}

/**
 * One sheet of a workbook. The first row holds the column names, cell
 * values keep the types the workbook stores (numbers, booleans, dates).
 */
export class SpreadsheetSource extends WorkerSource {
  public readonly kind: SourceKind = 'spreadsheet';
  public readonly sheetName: string;

  private readonly path?: string;
  private readonly loader?: () => Promise<WorkbookData>;

  constructor(options: SpreadsheetSourceOptions) {
    super(options.path ? `${basename(options.path)}:${options.sheetName}` : options.sheetName, options);

    if (!options.path && !options.load) {
      throw new TypeError('A spreadsheet source needs either a path or a loader');
    }

    this.sheetName = options.sheetName;
    this.path = options.path;
    this.loader = options.load;
  }

  protected async describe(signal?: AbortSignal): Promise<TableDescriptor> {
    if (this.path) {
      return { kind: 'spreadsheet', content: { path: this.path }, sheetName: this.sheetName };
    }

    if (!this.loader) {
      throw new TypeError('A spreadsheet source needs either a path or a loader');
    }

    const data = await this.loader();
    throwIfAborted(signal, `loading "${this.label}"`);
    return { kind: 'spreadsheet', content: toSharedContent(data), sheetName: this.sheetName };
  }
}
