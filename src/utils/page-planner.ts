// Pure planning functions turning a desired view position into a concrete,
// bounds-checked fetch request. Nothing here touches sources or state.

import { PAGE_SIZE, PageSizeOption } from '../config/constants';
import { InvalidSortError } from '../engines/errors';
import { PageRequest, Schema, SortSpec } from '../models/tabular-source';
import { isSortableType } from './column-types';

export interface PagePlan {
  /**
   * The canonical request, with the page index clamped into range.
   */
  request: PageRequest;
  pageCount: number;
  /**
   * 0-based index of the first row of the page.
   */
  offset: number;
  /**
   * Number of rows the page will hold (0 for an empty source).
   */
  limit: number;
}

function assertPageSize(pageSize: number): void {
  if (!Number.isInteger(pageSize) || pageSize <= 0) {
    throw new RangeError(`Page size must be a positive integer, got ${pageSize}`);
  }
}

/**
 * Parses a page size coming from the page-size menu or a custom input.
 *
 * @throws RangeError if the value is not an integer within `[PAGE_SIZE.MIN, PAGE_SIZE.MAX]`
 */
export function parsePageSize(input: number | string): number {
  const value = typeof input === 'string' ? Number(input.trim().replace(/[,_]/g, '')) : input;

  if (!Number.isInteger(value) || value < PAGE_SIZE.MIN || value > PAGE_SIZE.MAX) {
    throw new RangeError(
      `Page size must be an integer between ${PAGE_SIZE.MIN} and ${PAGE_SIZE.MAX}, got ${String(input)}`,
    );
  }

  return value;
}

export function isPresetPageSize(pageSize: number): pageSize is PageSizeOption {
  return PAGE_SIZE.OPTIONS.some((option) => option === pageSize);
}

export function computePageCount(rowCount: number, pageSize: number): number {
  assertPageSize(pageSize);

  if (rowCount <= 0) {
    return 0;
  }

  return Math.ceil(rowCount / pageSize);
}

/**
 * Clamps a page index into `[0, max(pageCount - 1, 0)]`. Navigating past
 * the last page lands on the last page, before the first on page 0.
 */
export function clampPageIndex(pageIndex: number, pageCount: number): number {
  const lastPage = Math.max(pageCount - 1, 0);

  if (!Number.isFinite(pageIndex) || pageIndex < 0) {
    return 0;
  }

  return Math.min(Math.floor(pageIndex), lastPage);
}

/**
 * Page index that keeps the first visible row visible after a page size change.
 */
export function anchorPageIndex(
  oldPageIndex: number,
  oldPageSize: number,
  newPageSize: number,
): number {
  assertPageSize(oldPageSize);
  assertPageSize(newPageSize);

  return Math.floor((oldPageIndex * oldPageSize) / newPageSize);
}

export function planPage(desired: PageRequest, rowCount: number): PagePlan {
  const pageCount = computePageCount(rowCount, desired.pageSize);
  const pageIndex = clampPageIndex(desired.pageIndex, pageCount);
  const offset = pageIndex * desired.pageSize;
  const limit = Math.max(0, Math.min(desired.pageSize, rowCount - offset));

  return {
    request: pageIndex === desired.pageIndex ? desired : { ...desired, pageIndex },
    pageCount,
    offset,
    limit,
  };
}

/**
 * Checks a sort spec against the current schema.
 *
 * @returns An `InvalidSortError` if the sort can't be applied, `null` otherwise
 */
export function validateSort(sort: SortSpec, schema: Schema): InvalidSortError | null {
  if (sort === null) {
    return null;
  }

  const { columnIndex } = sort;

  if (!Number.isInteger(columnIndex) || columnIndex < 0 || columnIndex >= schema.length) {
    return new InvalidSortError(
      columnIndex,
      `column index is out of bounds for a schema of ${schema.length} column(s)`,
    );
  }

  const column = schema[columnIndex];
  if (!isSortableType(column.type)) {
    return new InvalidSortError(columnIndex, `column "${column.name}" of type ${column.type} is not sortable`);
  }

  return null;
}

export function isSamePageRequest(a: PageRequest, b: PageRequest): boolean {
  return pageRequestKey(a) === pageRequestKey(b);
}

/**
 * Canonical string form of a request, used as the cache key.
 */
export function pageRequestKey(request: PageRequest): string {
  const sort = request.sort === null ? '-' : `${request.sort.columnIndex}:${request.sort.direction}`;

  return JSON.stringify([
    request.sourceId,
    sort,
    request.pageIndex,
    request.pageSize,
    request.searchQuery,
  ]);
}
