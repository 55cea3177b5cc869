import { describe, expect, it } from '@jest/globals';
import { EMPTY_VIEW_STATE, toViewEvent, ViewState } from '@models/view-state';
import { makeSourceId } from '@sources/base-source';
import { createViewStore, isRenderableChange } from '@store/view-store';
import { emptyResult, pageRequest } from '@tests/utils';

const source = { id: makeSourceId() };

describe('view store', () => {
  it('starts empty', () => {
    expect(createViewStore().getState()).toEqual(EMPTY_VIEW_STATE);
  });

  it('ignores changes to the desired request alone', () => {
    const prev: ViewState = { ...EMPTY_VIEW_STATE, desired: pageRequest(source) };
    const next: ViewState = { ...prev, desired: pageRequest(source, { pageIndex: 1 }) };

    expect(isRenderableChange(next, prev)).toBe(false);
    expect(isRenderableChange({ ...next, status: { kind: 'loading', requestId: 1 } }, prev)).toBe(true);
  });

  it('maps states to rendering events', () => {
    const result = emptyResult(pageRequest(source));
    const cause = new Error('locked');

    expect(toViewEvent({ ...EMPTY_VIEW_STATE, result })).toEqual({ status: 'idle', result });
    expect(toViewEvent({ ...EMPTY_VIEW_STATE, status: { kind: 'loading', requestId: 4 } })).toEqual({
      status: 'loading',
      requestId: 4,
      result: null,
    });
    expect(
      toViewEvent({ ...EMPTY_VIEW_STATE, result, status: { kind: 'error', requestId: 5, cause } }),
    ).toEqual({ status: 'error', cause, result });
  });
});
