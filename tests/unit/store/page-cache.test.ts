import { describe, expect, it } from '@jest/globals';
import { makeSourceId } from '@sources/base-source';
import { PageCache } from '@store/page-cache';
import { emptyResult, pageRequest } from '@tests/utils';

const first = { id: makeSourceId() };
const second = { id: makeSourceId() };

const page = (pageIndex: number, source = first) => pageRequest(source, { pageIndex });

describe('PageCache', () => {
  it('evicts the least recently used entry past capacity', () => {
    const cache = new PageCache(3);

    [0, 1, 2, 3].forEach((index) => cache.put(page(index), emptyResult(page(index))));

    expect(cache.size).toBe(3);
    expect(cache.get(page(0))).toBeUndefined();
    expect(cache.has(page(3))).toBe(true);
  });

  it('counts a hit as a use', () => {
    const cache = new PageCache(3);
    [0, 1, 2].forEach((index) => cache.put(page(index), emptyResult(page(index))));

    expect(cache.get(page(0))).toBeDefined();
    cache.put(page(3), emptyResult(page(3)));

    expect(cache.has(page(0))).toBe(true);
    expect(cache.has(page(1))).toBe(false);
    expect(cache.snapshot().map((entry) => entry.request.pageIndex)).toEqual([2, 0, 3]);
  });

  it('returns the stored result', () => {
    const cache = new PageCache();
    const result = emptyResult(page(1));

    cache.put(page(1), result);

    expect(cache.get(page(1))).toBe(result);
    expect(cache.get(pageRequest(first, { pageIndex: 1, searchQuery: 'ann' }))).toBeUndefined();
  });

  it('drops every entry of a source', () => {
    const cache = new PageCache();
    cache.put(page(0), emptyResult(page(0)));
    cache.put(page(1), emptyResult(page(1)));
    cache.put(page(0, second), emptyResult(page(0, second)));

    expect(cache.invalidateSource(first.id)).toBe(2);
    expect(cache.size).toBe(1);
    expect(cache.has(page(0, second))).toBe(true);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new PageCache(0)).toThrow(RangeError);
    expect(new PageCache().maxSize).toBe(64);
  });
});
