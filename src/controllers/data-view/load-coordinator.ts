import { DebugLogger, getLogger } from '../../engines/debug-logger';
import { CancelledOperation, InvalidSortError, toTabularSourceError } from '../../engines/errors';
import {
  PageRequest,
  PageResult,
  SourceId,
  SourceMutationEvent,
  TabularSource,
  Unsubscribe,
} from '../../models/tabular-source';
import {
  RequestId,
  StaleResultDiscarded,
  StaleResultOutcome,
  ViewState,
} from '../../models/view-state';
import { PageCache } from '../../store/page-cache';
import { ViewStore } from '../../store/view-store';
import { throwIfAborted } from '../../utils/abort';
import { normalizeSearchQuery } from '../../utils/display';
import { planPage, validateSort } from '../../utils/page-planner';

export interface LoadCoordinatorOptions {
  store: ViewStore;
  cache: PageCache;
  logger?: DebugLogger;
  /**
   * Diagnostic hook called for every completion that lost the race
   * against a newer request.
   */
  onStaleResult?: (record: StaleResultDiscarded) => void;
}

export interface DispatchOptions {
  /**
   * Re-read the source (schema and, for materialized sources, data) before
   * fetching instead of only making sure it is open.
   */
  reopen?: boolean;
}

type InFlightRequest = {
  id: RequestId;
  sourceId: SourceId;
  controller: AbortController;
  reopen: boolean;
};

type LoadOutcome = {
  result: PageResult;
  /**
   * Source generation the result was read under.
   */
  generation: number;
};

type AttachedSource = {
  source: TabularSource;
  unsubscribe: Unsubscribe;
};

// Filters are normalized, so an empty key can only mean "no filter"
const filterKey = (searchQuery: string | null): string => normalizeSearchQuery(searchQuery) ?? '';

/**
 * Turns desired page requests into background loads and reconciles their
 * completions into the view store.
 *
 * Every dispatch gets a new, monotonically increasing request id and
 * aborts the previous request's signal. A completion is committed only
 * while its id is still the latest one; the id check and the state write
 * happen in one synchronous section, so an older completion can never
 * overwrite a newer commit.
 *
 * A per-source generation counter is bumped whenever a source's cache is
 * invalidated. Loads that started under an older generation may still be
 * committed if current, but never re-populate the page cache.
 */
export class LoadCoordinator {
  private readonly store: ViewStore;
  private readonly cache: PageCache;
  private readonly logger: DebugLogger;
  private readonly onStaleResult?: (record: StaleResultDiscarded) => void;

  private latestRequestId: RequestId = 0;
  private inFlight: InFlightRequest | null = null;
  private readonly attached = new Map<SourceId, AttachedSource>();
  private readonly generations = new Map<SourceId, number>();
  private readonly rowCounts = new Map<SourceId, Map<string, number>>();
  private idleWaiters: Array<() => void> = [];
  private staleDiscards = 0;
  private disposed = false;

  constructor(options: LoadCoordinatorOptions) {
    this.store = options.store;
    this.cache = options.cache;
    this.logger = options.logger ?? getLogger('coordinator');
    this.onStaleResult = options.onStaleResult;
  }

  get latestId(): RequestId {
    return this.latestRequestId;
  }

  /**
   * Number of completions discarded because a newer request was dispatched.
   */
  get staleDiscardCount(): number {
    return this.staleDiscards;
  }

  get isLoading(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Starts listening to a source's mutation notifications. Attaching the
   * same source twice is a no-op.
   */
  attach(source: TabularSource): void {
    if (this.attached.has(source.id)) {
      return;
    }

    const unsubscribe = source.onMutated((event) => this.handleMutation(event));
    this.attached.set(source.id, { source, unsubscribe });
  }

  detach(sourceId: SourceId): void {
    this.attached.get(sourceId)?.unsubscribe();
    this.attached.delete(sourceId);
    this.invalidate(sourceId);
  }

  /**
   * Row count of a source under a filter as of the last load, if known.
   */
  knownRowCount(sourceId: SourceId, searchQuery: string | null): number | undefined {
    return this.rowCounts.get(sourceId)?.get(filterKey(searchQuery));
  }

  /**
   * Drops the cached pages and row counts of a source.
   */
  invalidate(sourceId: SourceId): void {
    this.generations.set(sourceId, this.generationOf(sourceId) + 1);
    const dropped = this.cache.invalidateSource(sourceId);
    this.rowCounts.delete(sourceId);

    this.logger.debug('Invalidated source cache', { sourceId, dropped });
  }

  /**
   * Requests a page. Returns the id of the new request.
   *
   * A cache hit is committed right away. Otherwise the view goes to
   * `loading` and the load starts in a microtask; the caller never waits
   * for adapter code, which runs on the source's worker threads.
   */
  dispatch(source: TabularSource, desired: PageRequest, options: DispatchOptions = {}): RequestId {
    if (this.disposed) {
      throw new CancelledOperation('load coordinator is disposed');
    }

    this.attach(source);

    this.latestRequestId += 1;
    const id = this.latestRequestId;
    const reopen = options.reopen ?? false;

    this.inFlight?.controller.abort();
    this.inFlight = null;

    if (!reopen) {
      const cached = this.cache.get(desired);
      if (cached) {
        this.logger.debug('Page cache hit', { requestId: id, sourceId: desired.sourceId });
        this.commit(cached);
        return id;
      }
    }

    const controller = new AbortController();
    this.inFlight = { id, sourceId: desired.sourceId, controller, reopen };

    this.store.setState({
      sourceId: desired.sourceId,
      desired,
      status: { kind: 'loading', requestId: id },
    });

    this.logger.debug('Dispatching page request', {
      requestId: id,
      sourceId: desired.sourceId,
      pageIndex: desired.pageIndex,
      pageSize: desired.pageSize,
      reopen,
    });

    Promise.resolve()
      .then(() => this.load(source, desired, reopen, controller.signal))
      .then(
        (outcome) => this.complete(id, outcome),
        (error: unknown) => this.fail(id, desired, error),
      )
      .catch((error: unknown) => {
        this.logger.error('Failed to apply page result', error, { requestId: id });
      });

    return id;
  }

  /**
   * Invalidates the source and loads the request again from a re-read source.
   */
  reload(source: TabularSource, desired: PageRequest): RequestId {
    this.invalidate(source.id);
    return this.dispatch(source, desired, { reopen: true });
  }

  /**
   * Resolves once no request is in flight.
   */
  whenIdle(): Promise<void> {
    if (!this.inFlight) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }

    this.disposed = true;
    this.inFlight?.controller.abort();
    this.inFlight = null;

    for (const { unsubscribe } of this.attached.values()) {
      unsubscribe();
    }
    this.attached.clear();
    this.rowCounts.clear();
    this.settleIdleWaiters();
  }

  private rememberRowCount(sourceId: SourceId, searchQuery: string | null, rowCount: number): void {
    let counts = this.rowCounts.get(sourceId);
    if (!counts) {
      counts = new Map();
      this.rowCounts.set(sourceId, counts);
    }
    counts.set(filterKey(searchQuery), rowCount);
  }

  private generationOf(sourceId: SourceId): number {
    return this.generations.get(sourceId) ?? 0;
  }

  private async load(
    source: TabularSource,
    desired: PageRequest,
    reopen: boolean,
    signal: AbortSignal,
  ): Promise<LoadOutcome> {
    throwIfAborted(signal, 'load was superseded before it started');
    const schema = reopen ? await source.refresh(signal) : await source.open(signal);
    // Read after a refresh, whose own mutation notice bumps the generation
    const generation = this.generationOf(source.id);
    throwIfAborted(signal, `loading "${source.label}"`);

    let rowCount = this.knownRowCount(source.id, desired.searchQuery);

    if (rowCount === undefined) {
      rowCount = await source.rowCount({ searchQuery: desired.searchQuery, signal });
      if (generation === this.generationOf(source.id)) {
        this.rememberRowCount(source.id, desired.searchQuery, rowCount);
      }
    }

    const plan = planPage(desired, rowCount);

    const sortError = validateSort(plan.request.sort, schema);
    if (sortError) {
      throw sortError;
    }

    throwIfAborted(signal, `loading "${source.label}"`);
    const result = await source.fetchPage(plan.request, signal);

    return { result, generation };
  }

  private complete(id: RequestId, { result, generation }: LoadOutcome): void {
    if (this.disposed) {
      return;
    }

    const { sourceId } = result.request;

    // Stale loads may still warm the cache, unless the source changed since
    if (generation === this.generationOf(sourceId)) {
      this.cache.put(result.request, result);
      this.rememberRowCount(sourceId, result.request.searchQuery, result.totalRowCount);
    }

    if (id !== this.latestRequestId) {
      this.discardStale(id, 'success');
      return;
    }

    this.inFlight = null;
    this.commit(result);
    this.logger.debug('Committed page', {
      requestId: id,
      sourceId,
      pageIndex: result.request.pageIndex,
      rows: result.rows.length,
    });
  }

  private fail(id: RequestId, desired: PageRequest, error: unknown): void {
    if (this.disposed) {
      return;
    }

    if (id !== this.latestRequestId) {
      this.discardStale(id, 'failure', error);
      return;
    }

    const cause =
      error instanceof Error ? error : toTabularSourceError(error, { sourceId: desired.sourceId });

    this.inFlight = null;

    const { committed } = this.store.getState();
    const patch: Partial<ViewState> = {
      status: { kind: 'error', requestId: id, cause },
    };

    if (cause instanceof InvalidSortError) {
      // The rejected sort is dropped, the last applied one stays
      patch.desired = {
        ...desired,
        sort: committed?.sourceId === desired.sourceId ? committed.sort : null,
      };
    }

    this.store.setState(patch);
    this.logger.warn('Page request failed', {
      requestId: id,
      sourceId: desired.sourceId,
      error: cause.message,
    });
    this.settleIdleWaiters();
  }

  private commit(result: PageResult): void {
    this.store.setState({
      sourceId: result.request.sourceId,
      schema: result.schema,
      desired: result.request,
      committed: result.request,
      result,
      status: { kind: 'idle' },
    });
    this.settleIdleWaiters();
  }

  private discardStale(id: RequestId, outcome: StaleResultOutcome, error?: unknown): void {
    this.staleDiscards += 1;

    const record: StaleResultDiscarded = {
      requestId: id,
      latestRequestId: this.latestRequestId,
      outcome,
    };

    if (error instanceof CancelledOperation) {
      this.logger.trace('Superseded request cancelled', { ...record });
    } else {
      this.logger.debug('Discarded stale result', error === undefined ? { ...record } : { ...record, error });
    }

    this.onStaleResult?.(record);
  }

  private handleMutation(event: SourceMutationEvent): void {
    if (this.disposed) {
      return;
    }

    this.logger.info('Source mutated', { sourceId: event.sourceId, kind: event.kind });
    this.invalidate(event.sourceId);

    if (event.kind === 'close') {
      return;
    }

    // A running refresh already reads the new data
    if (this.inFlight?.reopen && this.inFlight.sourceId === event.sourceId) {
      return;
    }

    const { sourceId, desired, committed } = this.store.getState();
    const attached = this.attached.get(event.sourceId);

    if (sourceId !== event.sourceId || !desired || !attached) {
      return;
    }

    if (committed || this.inFlight) {
      this.dispatch(attached.source, desired);
    }
  }

  private settleIdleWaiters(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }
}
