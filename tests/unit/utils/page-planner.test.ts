import { describe, expect, it } from '@jest/globals';
import { InvalidSortError } from '@engines/errors';
import { Schema } from '@models/tabular-source';
import { makeSourceId } from '@sources/base-source';
import {
  anchorPageIndex,
  clampPageIndex,
  computePageCount,
  isPresetPageSize,
  isSamePageRequest,
  pageRequestKey,
  parsePageSize,
  planPage,
  validateSort,
} from '@utils/page-planner';
import { pageRequest } from '@tests/utils';

const source = { id: makeSourceId() };

const schema: Schema = [
  { name: 'id', declaredType: 'INTEGER', type: 'numeric', index: 0 },
  { name: 'payload', declaredType: 'BLOB', type: 'blob', index: 1 },
];

describe('computePageCount', () => {
  it('is zero for an empty source', () => {
    expect(computePageCount(0, 10)).toBe(0);
  });

  it('rounds partial pages up', () => {
    expect(computePageCount(1, 10)).toBe(1);
    expect(computePageCount(10, 10)).toBe(1);
    expect(computePageCount(11, 10)).toBe(2);
    expect(computePageCount(1000, 25)).toBe(40);
  });

  it('rejects a non-positive page size', () => {
    expect(() => computePageCount(5, 0)).toThrow(RangeError);
  });
});

describe('clampPageIndex', () => {
  it('clamps into the page range', () => {
    expect(clampPageIndex(-1, 5)).toBe(0);
    expect(clampPageIndex(7, 5)).toBe(4);
    expect(clampPageIndex(3, 0)).toBe(0);
    expect(clampPageIndex(2.7, 5)).toBe(2);
    expect(clampPageIndex(Number.NaN, 5)).toBe(0);
  });
});

describe('anchorPageIndex', () => {
  it('keeps the first visible row visible', () => {
    expect(anchorPageIndex(5, 10, 25)).toBe(2);
    expect(anchorPageIndex(2, 25, 10)).toBe(5);
    expect(anchorPageIndex(0, 50, 10)).toBe(0);
  });
});

describe('planPage', () => {
  it('clamps a request past the last page', () => {
    const desired = pageRequest(source, { pageIndex: 7 });
    const plan = planPage(desired, 45);

    expect(plan.pageCount).toBe(5);
    expect(plan.request.pageIndex).toBe(4);
    expect(plan.offset).toBe(40);
    expect(plan.limit).toBe(5);
    expect(plan.request).not.toBe(desired);
  });

  it('returns the desired request itself when already in range', () => {
    const desired = pageRequest(source, { pageIndex: 2 });
    const plan = planPage(desired, 45);

    expect(plan.request).toBe(desired);
    expect(plan.limit).toBe(10);
  });

  it('plans an empty page for an empty source', () => {
    const plan = planPage(pageRequest(source, { pageIndex: 3 }), 0);

    expect(plan.pageCount).toBe(0);
    expect(plan.request.pageIndex).toBe(0);
    expect(plan.offset).toBe(0);
    expect(plan.limit).toBe(0);
  });
});

describe('parsePageSize', () => {
  it('accepts integers and numeric strings', () => {
    expect(parsePageSize(25)).toBe(25);
    expect(parsePageSize(' 25 ')).toBe(25);
    expect(parsePageSize('1,000')).toBe(1000);
    expect(parsePageSize('10_000')).toBe(10000);
  });

  it('rejects values outside the allowed range', () => {
    expect(() => parsePageSize('0')).toThrow(RangeError);
    expect(() => parsePageSize(100001)).toThrow(RangeError);
    expect(() => parsePageSize(2.5)).toThrow(RangeError);
    expect(() => parsePageSize('abc')).toThrow(RangeError);
  });

  it('recognizes the menu presets', () => {
    expect(isPresetPageSize(25)).toBe(true);
    expect(isPresetPageSize(30)).toBe(false);
  });
});

describe('validateSort', () => {
  it('accepts native order and sortable columns', () => {
    expect(validateSort(null, schema)).toBeNull();
    expect(validateSort({ columnIndex: 0, direction: 'desc' }, schema)).toBeNull();
  });

  it('rejects a column outside the schema', () => {
    const error = validateSort({ columnIndex: 3, direction: 'asc' }, schema);

    expect(error).toBeInstanceOf(InvalidSortError);
    expect(error?.message).toBe(
      'Cannot sort by column 3: column index is out of bounds for a schema of 2 column(s)',
    );
    expect(error?.columnIndex).toBe(3);
  });

  it('rejects a blob column', () => {
    const error = validateSort({ columnIndex: 1, direction: 'asc' }, schema);

    expect(error?.message).toBe('Cannot sort by column 1: column "payload" of type blob is not sortable');
  });
});

describe('pageRequestKey', () => {
  it('covers every request field', () => {
    const request = pageRequest(source, {
      sort: { columnIndex: 1, direction: 'desc' },
      pageIndex: 2,
    });

    expect(pageRequestKey(request)).toBe(JSON.stringify([source.id, '1:desc', 2, 10, null]));
  });

  it('tells requests apart by filter', () => {
    const a = pageRequest(source);
    const b = pageRequest(source, { searchQuery: 'ann' });

    expect(isSamePageRequest(a, b)).toBe(false);
    expect(isSamePageRequest(a, { ...a })).toBe(true);
  });
});
