import { NewId } from './new-id';

export type SourceId = NewId<'SourceId'>;

export type SourceKind = 'table' | 'delimited-file' | 'spreadsheet';

/**
 * Type tag that drives comparator selection. `blob` columns
 * can be displayed but never sorted.
 */
export type ColumnTypeTag = 'numeric' | 'text' | 'temporal' | 'boolean' | 'blob';

export interface SchemaColumn {
  name: string;
  /**
   * Type as declared by the underlying source (e.g. `VARCHAR(20)` for
   * a table column, or the inferred tag for file based sources).
   */
  declaredType: string;
  type: ColumnTypeTag;
  index: number;
}

export type Schema = readonly SchemaColumn[];

export type CellValue = string | number | bigint | boolean | Date | Uint8Array | null;
export type DataRow = CellValue[];

export type SortDirection = 'asc' | 'desc';

export type ColumnSortSpec = {
  columnIndex: number;
  direction: SortDirection;
};

/**
 * `null` means source-native order.
 */
export type SortSpec = ColumnSortSpec | null;

export interface PageRequest {
  sourceId: SourceId;
  sort: SortSpec;
  pageIndex: number;
  pageSize: number;
  /**
   * Case-insensitive substring filter over the display text of every cell.
   * `null` when no filter applies.
   */
  searchQuery: string | null;
}

export interface PageResult {
  /**
   * The (clamped) request this result answers.
   */
  request: PageRequest;
  schema: Schema;
  rows: DataRow[];
  /**
   * Total number of rows matching the request filter at fetch time.
   */
  totalRowCount: number;
  /**
   * The 0-based index of the first row of this page in the sorted data.
   */
  rowOffset: number;
}

export type RowCountOptions = {
  searchQuery?: string | null;
  signal?: AbortSignal;
};

export type QuantileAggregateType = 'q25' | 'median' | 'q75';

export type ColumnAggregateType = 'count' | 'sum' | 'avg' | 'min' | 'max' | 'std' | QuantileAggregateType;

export type Unsubscribe = () => void;

/**
 * `reload` follows an explicit refresh, `close` is emitted once when the
 * source is closed.
 */
export type SourceMutationKind = 'insert' | 'delete' | 'update' | 'reload' | 'close';

export interface SourceMutationEvent {
  sourceId: SourceId;
  kind: SourceMutationKind;
}

/**
 * Uniform capability every tabular data provider exposes to the engine.
 *
 * Implementations must be safe to call from a background task and must
 * never touch view state.
 */
export interface TabularSource {
  readonly id: SourceId;
  readonly kind: SourceKind;
  /**
   * Human readable name (table name, file name, sheet name).
   */
  readonly label: string;

  /**
   * Establishes the schema. Calling it on an already open source is a no-op
   * that returns the current schema.
   *
   * @throws SourceUnavailableError if the source can't be read or is closed
   */
  open(signal?: AbortSignal): Promise<Schema>;

  /**
   * @throws SourceUnavailableError if the source is not open or was closed
   */
  schema(): Schema;

  /**
   * @throws SourceUnavailableError if the source is not open or was closed
   * @throws SourceTimeoutError if counting exceeded the source deadline
   */
  rowCount(options?: RowCountOptions): Promise<number>;

  /**
   * Reads one window of rows in the requested order. The request is
   * expected to be already clamped by the planner; an out of range page
   * yields an empty row list.
   *
   * @throws SourceUnavailableError if the source is not open or was closed
   * @throws InvalidSortError if the sort column is out of bounds or not sortable
   * @throws SourceTimeoutError if the fetch exceeded the source deadline
   */
  fetchPage(request: PageRequest, signal?: AbortSignal): Promise<PageResult>;

  canSort(columnIndex: number): boolean;

  /**
   * Aggregates non-null values of a column. `count` counts non-null cells.
   * `sum`, `avg`, `std` (sample standard deviation) and the quantiles
   * (linear interpolation) are only defined for numeric columns and return
   * `null` otherwise, and for too few values.
   */
  getColumnAggregate(
    columnIndex: number,
    aggType: ColumnAggregateType,
    options?: RowCountOptions,
  ): Promise<CellValue>;

  /**
   * Re-reads the schema (and for materialized sources the data) and
   * notifies mutation listeners.
   */
  refresh(signal?: AbortSignal): Promise<Schema>;

  onMutated(listener: (event: SourceMutationEvent) => void): Unsubscribe;

  close(): Promise<void>;

  readonly closed: boolean;
}
