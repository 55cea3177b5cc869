export { PAGE_CACHE, PAGE_SIZE, SOURCE, SOURCE_WORKER, TASK_POOL } from './config/constants';
export type { PageSizeOption } from './config/constants';

export {
  createDataViewController,
  DataViewController,
} from './controllers/data-view/data-view-controller';
export type {
  DataViewControllerOptions,
  PageRequestChange,
} from './controllers/data-view/data-view-controller';
export { LoadCoordinator } from './controllers/data-view/load-coordinator';
export type { DispatchOptions, LoadCoordinatorOptions } from './controllers/data-view/load-coordinator';

export {
  createDebugLogger,
  DebugLogger,
  getLogger,
  LogLevel,
} from './engines/debug-logger';
export type { LogContext, LoggerConfig } from './engines/debug-logger';
export {
  CancelledOperation,
  InvalidSortError,
  SourceTimeoutError,
  SourceUnavailableError,
  TabularSourceError,
} from './engines/errors';
export type { ErrorDetails, TabularSourceErrorCode } from './engines/errors';
export { TaskPool } from './engines/task-pool';
export type { RunOptions, TaskPoolConfig } from './engines/task-pool';
export { MaterializedTableEngine, buildSchema } from './engines/materialized-table-engine';
export type { MaterializedTable } from './engines/materialized-table-engine';
export { listSqliteTables, SqliteTableEngine } from './engines/sqlite-table-engine';
export type { TableEngine } from './engines/table-engine';
export { listSpreadsheetSheets, loadDelimitedTable, loadSpreadsheetTable } from './engines/table-loaders';

export { getFetchTimeoutMs, getMaxWorkers, resolveViewConfig } from './models/app-config';
export type { Env, ViewConfig } from './models/app-config';
export type {
  CellValue,
  ColumnAggregateType,
  ColumnSortSpec,
  ColumnTypeTag,
  DataRow,
  PageRequest,
  PageResult,
  RowCountOptions,
  Schema,
  SchemaColumn,
  SortDirection,
  SortSpec,
  SourceId,
  SourceKind,
  SourceMutationEvent,
  SourceMutationKind,
  TabularSource,
  Unsubscribe,
} from './models/tabular-source';
export type {
  RequestId,
  SortChangeResult,
  StaleResultDiscarded,
  StaleResultOutcome,
  ViewEvent,
  ViewListener,
  ViewState,
  ViewStatus,
} from './models/view-state';
export { EMPTY_VIEW_STATE, toViewEvent } from './models/view-state';

export { BaseSource, makeSourceId } from './sources/base-source';
export type { BaseSourceOptions } from './sources/base-source';
export { DelimitedFileSource } from './sources/delimited-file-source';
export type { DelimitedFileSourceOptions } from './sources/delimited-file-source';
export { detectDataFileKind, openDataFile } from './sources/source-catalog';
export type { DataFile, OpenDataFileOptions } from './sources/source-catalog';
export {
  closeSharedSourceTaskPool,
  createSourceTaskPool,
  getSharedSourceTaskPool,
} from './sources/source-task-pool';
export type { SourceTaskPool } from './sources/source-task-pool';
export { SpreadsheetSource } from './sources/spreadsheet-source';
export type { SpreadsheetSourceOptions, WorkbookData } from './sources/spreadsheet-source';
export { SqliteTableSource } from './sources/sqlite-table-source';
export type { SqliteTableSourceOptions } from './sources/sqlite-table-source';
export { toSharedContent, WorkerSource } from './sources/worker-source';
export type { SourceData, WorkerSourceOptions } from './sources/worker-source';

export { PageCache } from './store/page-cache';
export type { PageCacheEntry } from './store/page-cache';
export { createViewStore } from './store/view-store';
export type { ReadonlyViewStore, ViewStore } from './store/view-store';

export { getErrorMessage, isRecoverableError } from './utils/error-utils';
export {
  anchorPageIndex,
  clampPageIndex,
  computePageCount,
  parsePageSize,
  planPage,
  validateSort,
} from './utils/page-planner';
export type { PagePlan } from './utils/page-planner';
export { toggleColumnSort } from './utils/sort';
