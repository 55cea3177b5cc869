import { createStore, StoreApi } from 'zustand/vanilla';

import { EMPTY_VIEW_STATE, ViewState } from '../models/view-state';

export type ViewStore = StoreApi<ViewState>;

/**
 * Read side of the view store handed to everyone except the load coordinator,
 * which is the single writer of committed state.
 */
export type ReadonlyViewStore = Pick<ViewStore, 'getState' | 'subscribe'>;

export const createViewStore = (): ViewStore =>
  createStore<ViewState>()(() => ({ ...EMPTY_VIEW_STATE }));

export const toReadonlyViewStore = (store: ViewStore): ReadonlyViewStore => ({
  getState: store.getState,
  subscribe: store.subscribe,
});

/**
 * Whether a state change is visible to the rendering layer. Changes to
 * `desired` alone (e.g. a reverted sort) are not.
 */
export const isRenderableChange = (state: ViewState, prevState: ViewState): boolean =>
  state.status !== prevState.status ||
  state.result !== prevState.result ||
  state.schema !== prevState.schema;
