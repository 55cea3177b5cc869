// Public data view controller API.
// By convention the order follows the intent groups: source, sort, paging,
// filter, loading, aggregates.

import { DebugLogger, getLogger } from '../../engines/debug-logger';
import { CancelledOperation, InvalidSortError, SourceUnavailableError } from '../../engines/errors';
import { Env, resolveViewConfig, ViewConfig } from '../../models/app-config';
import {
  CellValue,
  ColumnAggregateType,
  PageRequest,
  PageResult,
  Schema,
  SortDirection,
  TabularSource,
  Unsubscribe,
} from '../../models/tabular-source';
import {
  RequestId,
  SortChangeResult,
  StaleResultDiscarded,
  toViewEvent,
  ViewListener,
  ViewStatus,
} from '../../models/view-state';
import { PageCache } from '../../store/page-cache';
import {
  createViewStore,
  isRenderableChange,
  ReadonlyViewStore,
  toReadonlyViewStore,
  ViewStore,
} from '../../store/view-store';
import { toAbortablePromise } from '../../utils/abort';
import { normalizeSearchQuery } from '../../utils/display';
import {
  anchorPageIndex,
  computePageCount,
  isSamePageRequest,
  parsePageSize,
  planPage,
  validateSort,
} from '../../utils/page-planner';
import { isSameSortSpec, toggleColumnSort } from '../../utils/sort';
import { LoadCoordinator } from './load-coordinator';

export interface DataViewControllerOptions extends Partial<ViewConfig> {
  cache?: PageCache;
  logger?: DebugLogger;
  onStaleResult?: (record: StaleResultDiscarded) => void;
  /**
   * Environment to read configuration from. Defaults to `process.env`.
   */
  env?: Env;
}

export type PageRequestChange = Partial<Omit<PageRequest, 'sourceId'>>;

/**
 * Drives one paginated view over a tabular source.
 *
 * Every intent is turned into a desired page request by the planner and
 * handed to the load coordinator; none of them waits for data. Consumers
 * observe the outcome through `subscribe`.
 */
export class DataViewController {
  private readonly store: ViewStore;
  private readonly coordinator: LoadCoordinator;
  private readonly logger: DebugLogger;

  private source: TabularSource | null = null;
  private defaultPageSize: number;
  private aggregateController: AbortController | null = null;
  private disposed = false;

  constructor(options: DataViewControllerOptions = {}) {
    const config = resolveViewConfig(options, options.env);

    this.defaultPageSize = parsePageSize(config.pageSize);
    this.logger = options.logger ?? getLogger('data-view');
    this.store = createViewStore();
    this.coordinator = new LoadCoordinator({
      store: this.store,
      cache: options.cache ?? new PageCache(config.cacheCapacity),
      logger: this.logger.child('coordinator'),
      onStaleResult: options.onStaleResult,
    });
  }

  /**
   * ------------------------------------------------------------
   * --------------------------- Read ---------------------------
   * ------------------------------------------------------------
   */

  get view(): ReadonlyViewStore {
    return toReadonlyViewStore(this.store);
  }

  get activeSource(): TabularSource | null {
    return this.source;
  }

  get latestRequestId(): RequestId {
    return this.coordinator.latestId;
  }

  get staleDiscardCount(): number {
    return this.coordinator.staleDiscardCount;
  }

  desiredRequest(): PageRequest | null {
    return this.store.getState().desired;
  }

  committedResult(): PageResult | null {
    return this.store.getState().result;
  }

  status(): ViewStatus {
    return this.store.getState().status;
  }

  schema(): Schema {
    return this.store.getState().schema;
  }

  /**
   * Page count of the desired request, or `null` while the row count
   * under the current filter is unknown.
   */
  pageCount(): number | null {
    const desired = this.desiredRequest();
    if (!desired) {
      return null;
    }

    const rowCount = this.coordinator.knownRowCount(desired.sourceId, desired.searchQuery);
    return rowCount === undefined ? null : computePageCount(rowCount, desired.pageSize);
  }

  /**
   * Calls the listener on every change the rendering layer cares about:
   * status transitions and newly committed results.
   */
  subscribe(listener: ViewListener): Unsubscribe {
    return this.store.subscribe((state, prevState) => {
      if (isRenderableChange(state, prevState)) {
        listener(toViewEvent(state));
      }
    });
  }

  /**
   * ------------------------------------------------------------
   * -------------------------- Source --------------------------
   * ------------------------------------------------------------
   */

  /**
   * Shows a source from its first page in native order. The page size is
   * carried over, sort and filter are reset.
   */
  switchSource(source: TabularSource): RequestId {
    this.assertNotDisposed();

    const previous = this.source;
    if (previous && previous.id !== source.id) {
      this.coordinator.detach(previous.id);
    }

    this.source = source;
    this.abortAggregate();

    return this.coordinator.dispatch(source, {
      sourceId: source.id,
      sort: null,
      pageIndex: 0,
      pageSize: this.desiredRequest()?.pageSize ?? this.defaultPageSize,
      searchQuery: null,
    });
  }

  /**
   * Re-reads the active source and reloads the desired page.
   */
  refresh(): RequestId | null {
    const { source, desired } = this.active();
    if (!source || !desired) {
      return null;
    }

    return this.coordinator.reload(source, desired);
  }

  /**
   * Dispatches the desired request again, typically after an error.
   */
  retry(): RequestId | null {
    const { source, desired } = this.active();
    if (!source || !desired) {
      return null;
    }

    return this.coordinator.dispatch(source, desired);
  }

  /**
   * ------------------------------------------------------------
   * --------------------------- Sort ---------------------------
   * ------------------------------------------------------------
   */

  /**
   * Sorts by a column. An invalid column is rejected without dispatching
   * and the current sort stays.
   */
  setSort(columnIndex: number, direction: SortDirection): SortChangeResult {
    const { source, desired } = this.active();
    if (!source || !desired) {
      return { accepted: false, error: new SourceUnavailableError('No source is selected') };
    }

    const sort = { columnIndex, direction };
    const { schema, committed } = this.store.getState();

    // Until the first page of this source is in, the load itself validates
    if (committed?.sourceId === source.id) {
      const error =
        validateSort(sort, schema) ??
        (source.canSort(columnIndex)
          ? null
          : new InvalidSortError(columnIndex, `"${source.label}" can't sort by this column`, {
              sourceId: source.id,
            }));

      if (error) {
        this.logger.debug('Rejected sort request', { columnIndex, reason: error.message });
        return { accepted: false, error };
      }
    }

    return { accepted: true, requestId: this.requestChange({ sort }) };
  }

  clearSort(): RequestId | null {
    return this.requestChange({ sort: null });
  }

  /**
   * Header click: cycles the column through ascending, descending and
   * source order.
   */
  toggleColumnSort(columnIndex: number): SortChangeResult {
    const next = toggleColumnSort(this.desiredRequest()?.sort ?? null, columnIndex);

    if (next === null) {
      return { accepted: true, requestId: this.clearSort() };
    }

    return this.setSort(next.columnIndex, next.direction);
  }

  /**
   * ------------------------------------------------------------
   * -------------------------- Paging --------------------------
   * ------------------------------------------------------------
   */

  goToPage(pageIndex: number): RequestId | null {
    return this.requestChange({ pageIndex });
  }

  nextPage(): RequestId | null {
    const desired = this.desiredRequest();
    return desired ? this.goToPage(desired.pageIndex + 1) : null;
  }

  previousPage(): RequestId | null {
    const desired = this.desiredRequest();
    return desired ? this.goToPage(Math.max(desired.pageIndex - 1, 0)) : null;
  }

  /**
   * Changes the page size keeping the first visible row on screen.
   *
   * @throws RangeError if the size is not an integer within the allowed range
   */
  setPageSize(size: number | string): RequestId | null {
    const pageSize = parsePageSize(size);
    const desired = this.desiredRequest();

    if (!desired) {
      this.defaultPageSize = pageSize;
      return null;
    }

    return this.requestChange({
      pageSize,
      pageIndex: anchorPageIndex(desired.pageIndex, desired.pageSize, pageSize),
    });
  }

  /**
   * ------------------------------------------------------------
   * -------------------------- Filter --------------------------
   * ------------------------------------------------------------
   */

  setSearchQuery(query: string | null): RequestId | null {
    return this.requestChange({ searchQuery: normalizeSearchQuery(query) });
  }

  /**
   * ------------------------------------------------------------
   * ------------------------- Loading --------------------------
   * ------------------------------------------------------------
   */

  /**
   * Applies a change to the desired request. Sort and filter changes go
   * back to the first page unless a page is given. The result is clamped
   * when the row count is known and dispatched unless nothing changed.
   *
   * @returns The id of the dispatched request, `null` if nothing was dispatched
   */
  requestChange(change: PageRequestChange): RequestId | null {
    const { source, desired } = this.active();
    if (!source || !desired) {
      return null;
    }

    const merged: PageRequest = { ...desired, ...change };

    const resetsPosition =
      (change.sort !== undefined && !isSameSortSpec(change.sort, desired.sort)) ||
      (change.searchQuery !== undefined && change.searchQuery !== desired.searchQuery);
    if (resetsPosition && change.pageIndex === undefined) {
      merged.pageIndex = 0;
    }

    const rowCount = this.coordinator.knownRowCount(source.id, merged.searchQuery);
    const next = rowCount === undefined ? merged : planPage(merged, rowCount).request;

    if (isSamePageRequest(next, desired) && this.status().kind !== 'error') {
      return null;
    }

    return this.coordinator.dispatch(source, next);
  }

  /**
   * Resolves once the latest request has been committed or has failed.
   */
  whenIdle(): Promise<void> {
    return this.coordinator.whenIdle();
  }

  /**
   * ------------------------------------------------------------
   * ------------------------ Aggregates ------------------------
   * ------------------------------------------------------------
   */

  /**
   * Aggregates a column of the active source under the current filter.
   * Starting another aggregate cancels this one.
   *
   * @returns The value, or `undefined` if the aggregate was superseded
   */
  async getColumnAggregate(
    columnIndex: number,
    aggType: ColumnAggregateType,
  ): Promise<CellValue | undefined> {
    const { source, desired } = this.active();
    if (!source) {
      throw new SourceUnavailableError('No source is selected');
    }

    this.abortAggregate();
    const controller = new AbortController();
    this.aggregateController = controller;

    const task = source.getColumnAggregate(columnIndex, aggType, {
      searchQuery: desired?.searchQuery ?? null,
      signal: controller.signal,
    });

    try {
      const { value, aborted } = await toAbortablePromise({
        promise: task,
        signal: controller.signal,
      });
      return aborted ? undefined : value;
    } catch (error) {
      if (error instanceof CancelledOperation && controller.signal.aborted) {
        return undefined;
      }
      throw error;
    } finally {
      if (this.aggregateController === controller) {
        this.aggregateController = null;
      }
    }
  }

  /**
   * ------------------------------------------------------------
   * ------------------------- Dispose --------------------------
   * ------------------------------------------------------------
   */

  /**
   * Stops all background work of this view. Sources are not closed.
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }

    this.disposed = true;
    this.abortAggregate();
    this.coordinator.dispose();
  }

  private active(): { source: TabularSource | null; desired: PageRequest | null } {
    if (this.disposed) {
      return { source: null, desired: null };
    }
    return { source: this.source, desired: this.desiredRequest() };
  }

  private abortAggregate(): void {
    this.aggregateController?.abort();
    this.aggregateController = null;
  }

  private assertNotDisposed(): void {
    if (this.disposed) {
      throw new CancelledOperation('data view is disposed');
    }
  }
}

export const createDataViewController = (
  options: DataViewControllerOptions = {},
): DataViewController => new DataViewController(options);
