import { afterEach, describe, expect, it, jest } from '@jest/globals';
import {
  DataViewController,
  DataViewControllerOptions,
} from '@controllers/data-view/data-view-controller';
import { DebugLogger } from '@engines/debug-logger';
import { CancelledOperation, InvalidSortError, SourceTimeoutError } from '@engines/errors';
import { StaleResultDiscarded, ViewEvent } from '@models/view-state';
import { PageCache } from '@store/page-cache';
import { FakeSource, FakeSourceOptions, makeFakeRows, sleep } from '@tests/utils';

describe('DataViewController', () => {
  const controllers: DataViewController[] = [];

  const createController = (options: DataViewControllerOptions = {}) => {
    const controller = new DataViewController({
      env: {},
      pageSize: 10,
      logger: new DebugLogger({ enabled: false }),
      ...options,
    });
    controllers.push(controller);
    return controller;
  };

  const createSource = (options: FakeSourceOptions = {}) =>
    new FakeSource({ rowCount: 1000, logger: new DebugLogger({ enabled: false }), ...options });

  const showSource = async (controller: DataViewController, source: FakeSource) => {
    controller.switchSource(source);
    await controller.whenIdle();
  };

  const firstId = (controller: DataViewController) => controller.committedResult()?.rows[0]?.[0];

  afterEach(() => {
    controllers.splice(0).forEach((controller) => controller.dispose());
  });

  describe('loading', () => {
    it('loads the first page of a source in the background', async () => {
      const controller = createController();
      const source = createSource();

      const requestId = controller.switchSource(source);

      expect(requestId).toBe(1);
      expect(controller.status()).toEqual({ kind: 'loading', requestId: 1 });
      expect(controller.committedResult()).toBeNull();

      await controller.whenIdle();

      expect(controller.status()).toEqual({ kind: 'idle' });
      expect(firstId(controller)).toBe(0);
      expect(controller.committedResult()?.totalRowCount).toBe(1000);
      expect(controller.committedResult()?.rows).toHaveLength(10);
      expect(controller.pageCount()).toBe(100);
      expect(controller.schema().map((column) => column.name)).toEqual(['id', 'name', 'payload']);
    });

    it('notifies subscribers of status changes and results', async () => {
      const controller = createController();
      const events: ViewEvent['status'][] = [];
      const unsubscribe = controller.subscribe((event) => events.push(event.status));

      await showSource(controller, createSource());
      unsubscribe();
      controller.goToPage(1);

      expect(events).toEqual(['loading', 'idle']);
    });

    it('never lets an older completion overwrite a newer page', async () => {
      const onStaleResult = jest.fn<(record: StaleResultDiscarded) => void>();
      const controller = createController({ onStaleResult });
      const source = createSource({
        fetchDelayMs: ({ pageIndex }) => (pageIndex === 1 ? 200 : pageIndex === 2 ? 10 : 0),
      });
      await showSource(controller, source);

      controller.goToPage(1);
      await sleep(20);
      controller.goToPage(2);
      await controller.whenIdle();

      expect(controller.committedResult()?.request.pageIndex).toBe(2);

      await sleep(250);

      expect(controller.committedResult()?.request.pageIndex).toBe(2);
      expect(controller.status()).toEqual({ kind: 'idle' });
      expect(controller.staleDiscardCount).toBe(1);
      expect(onStaleResult).toHaveBeenCalledWith({
        requestId: 2,
        latestRequestId: 3,
        outcome: 'success',
      });
    });

    it('serves cached pages synchronously', async () => {
      const controller = createController();
      const source = createSource();
      await showSource(controller, source);
      controller.goToPage(1);
      await controller.whenIdle();
      const fetches = source.fetchRequests.length;

      controller.goToPage(0);

      expect(controller.status()).toEqual({ kind: 'idle' });
      expect(controller.committedResult()?.request.pageIndex).toBe(0);
      expect(source.fetchRequests).toHaveLength(fetches);
    });

    it('keeps the last page on failure and recovers on retry', async () => {
      const controller = createController();
      const source = createSource();
      await showSource(controller, source);

      source.failNextFetch(new SourceTimeoutError(100, { operation: 'fetch page' }));
      controller.goToPage(1);
      await controller.whenIdle();

      const status = controller.status();
      expect(status.kind).toBe('error');
      expect(status.kind === 'error' && status.cause).toBeInstanceOf(SourceTimeoutError);
      expect(controller.committedResult()?.request.pageIndex).toBe(0);
      expect(controller.desiredRequest()?.pageIndex).toBe(1);

      controller.retry();
      await controller.whenIdle();

      expect(controller.status()).toEqual({ kind: 'idle' });
      expect(firstId(controller)).toBe(10);
    });

    it('reloads the source on refresh', async () => {
      const controller = createController();
      const source = createSource();
      await showSource(controller, source);

      source.rows = makeFakeRows(5);
      controller.refresh();
      await controller.whenIdle();

      expect(source.loadCount).toBe(2);
      expect(controller.committedResult()?.totalRowCount).toBe(5);
      expect(controller.pageCount()).toBe(1);
    });

    it('invalidates cached pages when the source reports a mutation', async () => {
      const cache = new PageCache(16);
      const controller = createController({ cache });
      const source = createSource();
      await showSource(controller, source);
      controller.goToPage(1);
      await controller.whenIdle();
      expect(cache.size).toBe(2);

      source.notifyMutated('insert');

      expect(cache.size).toBe(0);
      expect(controller.status().kind).toBe('loading');

      await controller.whenIdle();
      expect(cache.size).toBe(1);
      expect(controller.committedResult()?.request.pageIndex).toBe(1);
    });
  });

  describe('paging', () => {
    it('keeps the first visible row when the page size changes', async () => {
      const controller = createController();
      await showSource(controller, createSource());
      controller.goToPage(5);
      await controller.whenIdle();

      controller.setPageSize(25);
      await controller.whenIdle();

      const result = controller.committedResult();
      expect(result?.request.pageIndex).toBe(2);
      expect(result?.rowOffset).toBe(50);
      expect(firstId(controller)).toBe(50);
    });

    it('clamps pages past the end', async () => {
      const controller = createController();
      await showSource(controller, createSource());

      controller.goToPage(500);
      await controller.whenIdle();

      expect(controller.committedResult()?.request.pageIndex).toBe(99);
      expect(firstId(controller)).toBe(990);
    });

    it('does not dispatch when the page stays the same', async () => {
      const controller = createController();
      await showSource(controller, createSource());

      expect(controller.previousPage()).toBeNull();
      expect(controller.nextPage()).toBe(2);
    });

    it('uses a page size chosen before any source', async () => {
      const controller = createController();

      expect(controller.setPageSize('25')).toBeNull();
      await showSource(controller, createSource());

      expect(controller.committedResult()?.rows).toHaveLength(25);
      expect(() => controller.setPageSize(0)).toThrow(RangeError);
    });
  });

  describe('sorting and filtering', () => {
    it('rejects invalid sorts without dispatching', async () => {
      const controller = createController();
      await showSource(controller, createSource());

      const outOfRange = controller.setSort(7, 'asc');
      const binary = controller.setSort(2, 'asc');

      expect(outOfRange.accepted).toBe(false);
      expect(!binary.accepted && binary.error).toBeInstanceOf(InvalidSortError);
      expect(controller.latestRequestId).toBe(1);
      expect(controller.desiredRequest()?.sort).toBeNull();
    });

    it('sorts and toggles back to source order', async () => {
      const controller = createController();
      await showSource(controller, createSource());

      expect(controller.toggleColumnSort(0)).toEqual({ accepted: true, requestId: 2 });
      await controller.whenIdle();
      expect(firstId(controller)).toBe(0);

      controller.toggleColumnSort(0);
      await controller.whenIdle();
      expect(firstId(controller)).toBe(999);

      controller.toggleColumnSort(0);
      await controller.whenIdle();
      expect(controller.desiredRequest()?.sort).toBeNull();
      expect(firstId(controller)).toBe(0);
    });

    it('goes back to the first page on a sort change', async () => {
      const controller = createController();
      await showSource(controller, createSource());
      controller.goToPage(3);
      await controller.whenIdle();

      controller.setSort(1, 'desc');
      await controller.whenIdle();

      expect(controller.committedResult()?.request.pageIndex).toBe(0);
      expect(controller.committedResult()?.rows[0][1]).toBe('name-0999');
    });

    it('filters rows by a search query', async () => {
      const controller = createController();
      await showSource(controller, createSource());

      controller.setSearchQuery('  NAME-001 ');
      await controller.whenIdle();

      expect(controller.desiredRequest()?.searchQuery).toBe('NAME-001');
      expect(controller.committedResult()?.totalRowCount).toBe(10);
      expect(controller.pageCount()).toBe(1);
      expect(firstId(controller)).toBe(10);

      controller.setSearchQuery('');
      await controller.whenIdle();
      expect(controller.pageCount()).toBe(100);
    });

    it('reverts a sort the source rejects', async () => {
      const controller = createController();
      const source = createSource();

      controller.switchSource(source);
      controller.setSort(2, 'asc');
      await controller.whenIdle();

      const status = controller.status();
      expect(status.kind === 'error' && status.cause).toBeInstanceOf(InvalidSortError);
      expect(controller.desiredRequest()?.sort).toBeNull();
      expect(controller.staleDiscardCount).toBe(1);

      controller.retry();
      await controller.whenIdle();

      expect(controller.status()).toEqual({ kind: 'idle' });
      expect(firstId(controller)).toBe(0);
    });
  });

  describe('sources', () => {
    it('resets sort and filter but keeps the page size on a source switch', async () => {
      const controller = createController();
      const first = createSource();
      const second = createSource({ rowCount: 30 });
      await showSource(controller, first);
      controller.setPageSize(25);
      controller.setSort(0, 'desc');
      await controller.whenIdle();

      await showSource(controller, second);

      expect(controller.activeSource).toBe(second);
      expect(controller.desiredRequest()).toEqual({
        sourceId: second.id,
        sort: null,
        pageIndex: 0,
        pageSize: 25,
        searchQuery: null,
      });
      expect(controller.pageCount()).toBe(2);

      const latest = controller.latestRequestId;
      first.notifyMutated('update');
      expect(controller.latestRequestId).toBe(latest);
    });

    it('stops working once disposed', async () => {
      const controller = createController();
      const source = createSource();
      await showSource(controller, source);

      controller.dispose();

      expect(() => controller.switchSource(source)).toThrow(CancelledOperation);
      expect(controller.goToPage(1)).toBeNull();
      expect(controller.refresh()).toBeNull();
    });
  });

  describe('aggregates', () => {
    it('aggregates under the current filter', async () => {
      const controller = createController();
      await showSource(controller, createSource({ rowCount: 4 }));

      expect(await controller.getColumnAggregate(0, 'sum')).toBe(6);

      controller.setSearchQuery('name-0002');
      await controller.whenIdle();
      expect(await controller.getColumnAggregate(0, 'max')).toBe(2);
    });

    it('drops an aggregate superseded by another one', async () => {
      const controller = createController();
      await showSource(controller, createSource({ rowCount: 4 }));

      const first = controller.getColumnAggregate(0, 'sum');
      const second = controller.getColumnAggregate(0, 'max');

      await expect(first).resolves.toBeUndefined();
      await expect(second).resolves.toBe(3);
    });

    it('needs a source', async () => {
      const controller = createController();

      await expect(controller.getColumnAggregate(0, 'count')).rejects.toThrow('No source is selected');
    });
  });
});
