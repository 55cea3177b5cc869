import { SOURCE } from '../config/constants';
import { DebugLogger, getLogger } from '../engines/debug-logger';
import {
  CancelledOperation,
  SourceUnavailableError,
  toTabularSourceError,
} from '../engines/errors';
import { withTimeout } from '../engines/with-timeout';
import {
  Schema,
  SourceId,
  SourceKind,
  SourceMutationEvent,
  SourceMutationKind,
  Unsubscribe,
} from '../models/tabular-source';
import { getFetchTimeoutMs } from '../models/app-config';
import { throwIfAborted } from '../utils/abort';
import { makeIdFactory } from '../utils/new-id';

export const makeSourceId = makeIdFactory<SourceId>();

export interface BaseSourceOptions {
  /**
   * Stable identity of the source. Generated when omitted.
   */
  id?: SourceId;
  label?: string;
  /**
   * Deadline for a single open/count/fetch/aggregate call.
   */
  timeoutMs?: number;
  logger?: DebugLogger;
}

/**
 * Shared plumbing of all source adapters: identity, lifecycle, mutation
 * listeners and the timeout/error envelope around every operation.
 */
export abstract class BaseSource {
  public readonly id: SourceId;
  public readonly label: string;
  public abstract readonly kind: SourceKind;

  protected readonly timeoutMs: number;
  protected readonly logger: DebugLogger;

  private readonly mutationListeners = new Set<(event: SourceMutationEvent) => void>();
  private _closed = false;

  protected constructor(defaultLabel: string, options: BaseSourceOptions) {
    this.id = options.id ?? makeSourceId();
    this.label = options.label ?? defaultLabel;
    this.timeoutMs = options.timeoutMs ?? getFetchTimeoutMs();
    this.logger = options.logger ?? getLogger('source');

    if (!Number.isInteger(this.timeoutMs) || this.timeoutMs <= 0 || this.timeoutMs > SOURCE.MAX_TIMEOUT_MS) {
      throw new RangeError(`Source timeout must be within (0, ${SOURCE.MAX_TIMEOUT_MS}]ms`);
    }
  }

  get closed(): boolean {
    return this._closed;
  }

  onMutated(listener: (event: SourceMutationEvent) => void): Unsubscribe {
    this.mutationListeners.add(listener);
    return () => {
      this.mutationListeners.delete(listener);
    };
  }

  /**
   * Lets the owner of the underlying data announce that rows were inserted,
   * deleted or changed outside of this adapter.
   */
  notifyMutated(kind: SourceMutationKind): void {
    const event: SourceMutationEvent = { sourceId: this.id, kind };

    for (const listener of Array.from(this.mutationListeners)) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error('Mutation listener failed', error, { sourceId: this.id, kind });
      }
    }
  }

  async close(): Promise<void> {
    if (this._closed) {
      return;
    }

    this._closed = true;
    await this.release();
    this.notifyMutated('close');
    this.mutationListeners.clear();
  }

  abstract schema(): Schema;

  /**
   * Frees what the adapter holds (connections, materialized rows).
   */
  protected abstract release(): Promise<void>;

  protected assertOpen(operation: string): void {
    if (this._closed) {
      throw new SourceUnavailableError(`Source "${this.label}" is closed`, {
        sourceId: this.id,
        operation,
      });
    }
  }

  /**
   * Runs an adapter operation with the source deadline, a closed check and
   * the engine error taxonomy applied to whatever it throws.
   */
  protected async runOperation<T>(
    operation: string,
    signal: AbortSignal | undefined,
    fn: () => Promise<T>,
  ): Promise<T> {
    this.assertOpen(operation);
    throwIfAborted(signal, `${operation} on "${this.label}"`);

    try {
      return await withTimeout(fn, this.timeoutMs, { sourceId: this.id, operation });
    } catch (error) {
      if (error instanceof CancelledOperation) {
        throw error;
      }
      throw toTabularSourceError(error, { sourceId: this.id, operation });
    }
  }
}
