import { PageRequest, PageResult, Schema, SourceId } from './tabular-source';

export type RequestId = number;

export type ViewStatus =
  | { kind: 'idle' }
  | { kind: 'loading'; requestId: RequestId }
  | { kind: 'error'; requestId: RequestId; cause: Error };

export interface ViewState {
  sourceId: SourceId | null;
  /**
   * Schema of the active source. Empty until the first page of a source
   * is committed. An empty schema reads as `no data available`, unlike
   * an empty result which means data is available but has no rows.
   */
  schema: Schema;
  /**
   * The request the user asked for most recently (after planning).
   */
  desired: PageRequest | null;
  /**
   * The request whose result is currently applied.
   */
  committed: PageRequest | null;
  /**
   * The last applied result. Never reset on failure, so the view keeps
   * showing the last good page next to the error.
   */
  result: PageResult | null;
  status: ViewStatus;
}

/**
 * What the rendering layer receives on every view state change.
 */
export type ViewEvent =
  | { status: 'idle'; result: PageResult | null }
  | { status: 'loading'; requestId: RequestId; result: PageResult | null }
  | { status: 'error'; cause: Error; result: PageResult | null };

export type ViewListener = (event: ViewEvent) => void;

export type StaleResultOutcome = 'success' | 'failure';

/**
 * Diagnostic record for a completion that arrived after a newer request
 * was dispatched. Never surfaced to the user.
 */
export interface StaleResultDiscarded {
  requestId: RequestId;
  latestRequestId: RequestId;
  outcome: StaleResultOutcome;
}

export type SortChangeResult =
  | { accepted: true; requestId: RequestId | null }
  | { accepted: false; error: Error };

export const EMPTY_VIEW_STATE: ViewState = {
  sourceId: null,
  schema: [],
  desired: null,
  committed: null,
  result: null,
  status: { kind: 'idle' },
};

export const toViewEvent = (state: ViewState): ViewEvent => {
  const { status, result } = state;

  switch (status.kind) {
    case 'idle':
      return { status: 'idle', result };
    case 'loading':
      return { status: 'loading', requestId: status.requestId, result };
    case 'error':
      return { status: 'error', cause: status.cause, result };
    default: {
      const _: never = status;
      return _;
    }
  }
};
