import { extname } from 'path';
import { Worker } from 'worker_threads';

import { TASK_POOL } from '../config/constants';
import { DebugLogger, getLogger } from './debug-logger';
import {
  CancelledOperation,
  deserializeError,
  ErrorDetails,
  SerializedError,
  SourceTimeoutError,
} from './errors';

export interface WorkerEnvelope<TRequest> {
  id: number;
  request: TRequest;
}

export interface WorkerSuccessReply<T = unknown> {
  id: number;
  success: true;
  result: T;
}

export interface WorkerErrorReply {
  id: number;
  success: false;
  error: SerializedError;
}

export type WorkerReply<T = unknown> = WorkerSuccessReply<T> | WorkerErrorReply;

export interface TaskPoolConfig {
  /**
   * Entry module of the worker threads. A `.ts` entry is loaded through tsx.
   */
  workerFile: string;
  maxConcurrency: number;
  logger: DebugLogger;
}

export type TaskDetails = Omit<ErrorDetails, 'originalError' | 'originalStack'>;

export interface RunOptions {
  signal?: AbortSignal;
  /**
   * Deadline from the moment the task is queued. A task still running when
   * it passes is rejected with `SourceTimeoutError` and its worker thread
   * is terminated and replaced.
   */
  timeoutMs?: number;
  /**
   * Attached to errors coming back from the worker.
   */
  details?: TaskDetails;
}

type PendingCall = {
  id: number;
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
  details: TaskDetails;
  signal?: AbortSignal;
  onAbort?: () => void;
  timeoutId?: ReturnType<typeof setTimeout>;
};

type QueuedTask<TRequest> = PendingCall & {
  request: TRequest;
  slot: WorkerSlot | null;
};

type WorkerSlot = {
  worker: Worker;
  calls: Map<number, PendingCall>;
  /**
   * Id of the task occupying the thread, `null` when idle.
   */
  taskId: number | null;
};

const TS_WORKER_BOOTSTRAP = [
  "const { workerData } = require('worker_threads');",
  'require(workerData.loader);',
  'require(workerData.entry);',
].join('\n');

function startWorker(file: string): Worker {
  if (extname(file) === '.ts') {
    return new Worker(TS_WORKER_BOOTSTRAP, {
      eval: true,
      workerData: { entry: file, loader: require.resolve('tsx/cjs') },
    });
  }

  return new Worker(file);
}

function isWorkerReply(value: unknown): value is WorkerReply {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'number' &&
    'success' in value &&
    typeof value.success === 'boolean'
  );
}

/**
 * Bounded pool of worker threads for fetch, sort and count tasks.
 *
 * At most `maxConcurrency` tasks run at the same time, one per thread, the
 * rest wait in FIFO order. Threads are started on demand and don't keep
 * the process alive while idle. Tasks are plain messages; a thread handles
 * them synchronously, so the calling thread never runs adapter code.
 *
 * Cancellation is cooperative: a task whose signal is aborted while still
 * queued is rejected with `CancelledOperation` and never posted. A task
 * that already runs is left to finish.
 */
export class TaskPool<TRequest> {
  /** The maximum number of tasks running at once */
  protected readonly _maxConcurrency: number;
  /** Tasks waiting for a free thread */
  protected readonly _queue: QueuedTask<TRequest>[] = [];

  private readonly workerFile: string;
  private readonly logger: DebugLogger;
  private readonly slots: WorkerSlot[] = [];
  private requestId = 0;
  private _closed = false;
  private _drainScheduled = false;

  constructor(config: Pick<TaskPoolConfig, 'workerFile'> & Partial<TaskPoolConfig>) {
    const maxConcurrency = config.maxConcurrency ?? TASK_POOL.DEFAULT_MAX_CONCURRENCY;

    if (!Number.isInteger(maxConcurrency) || maxConcurrency <= 0) {
      throw new RangeError(`Task pool concurrency must be a positive integer, got ${maxConcurrency}`);
    }

    this._maxConcurrency = maxConcurrency;
    this.workerFile = config.workerFile;
    this.logger = config.logger ?? getLogger('pool');
  }

  /** Number of running tasks */
  get active(): number {
    return this.slots.filter((slot) => slot.taskId !== null).length;
  }

  /** Number of queued tasks */
  get pending(): number {
    return this._queue.length;
  }

  /** Number of live worker threads */
  get threads(): number {
    return this.slots.length;
  }

  get closed(): boolean {
    return this._closed;
  }

  get maxConcurrency(): number {
    return this._maxConcurrency;
  }

  /**
   * Queues a task for the next free thread.
   *
   * @throws CancelledOperation (as rejection) if the pool is closed or the
   *         signal is aborted before the task starts
   * @throws SourceTimeoutError (as rejection) if the deadline passes first
   */
  run<TResult>(request: TRequest, options: RunOptions = {}): Promise<TResult> {
    const { signal, timeoutMs } = options;

    if (this._closed) {
      return Promise.reject(new CancelledOperation('task pool is closed'));
    }

    if (signal?.aborted) {
      return Promise.reject(new CancelledOperation('task was superseded before it started'));
    }

    return new Promise<TResult>((resolve, reject) => {
      this.requestId += 1;

      const task: QueuedTask<TRequest> = {
        id: this.requestId,
        request,
        details: options.details ?? {},
        resolve: resolve as (value: unknown) => void,
        reject,
        signal,
        slot: null,
      };

      if (signal) {
        task.onAbort = () => this.cancelQueued(task);
        signal.addEventListener('abort', task.onAbort, { once: true });
      }

      if (timeoutMs !== undefined) {
        task.timeoutId = setTimeout(() => this.expire(task, timeoutMs), timeoutMs);
      }

      this._queue.push(task);
      this._scheduleDrain();
    });
  }

  /**
   * Posts a message to every live thread, outside the task slots. Used to
   * drop per-thread state.
   */
  async broadcast(request: TRequest): Promise<void> {
    const deliveries = this.slots.map(
      (slot) =>
        new Promise<unknown>((resolve, reject) => {
          this.requestId += 1;
          const call: PendingCall = { id: this.requestId, resolve, reject, details: {} };
          slot.calls.set(call.id, call);
          this.post(slot, call, request);
        }),
    );

    const outcomes = await Promise.allSettled(deliveries);
    outcomes.forEach((outcome) => {
      if (outcome.status === 'rejected') {
        this.logger.debug('Broadcast not delivered', { reason: String(outcome.reason) });
      }
    });
  }

  /**
   * Rejects all queued and running tasks, terminates the threads and
   * refuses new tasks.
   */
  async close(): Promise<void> {
    if (this._closed) {
      return;
    }

    this._closed = true;

    const queued = this._queue.splice(0, this._queue.length);
    for (const task of queued) {
      this.release(task);
      task.reject(new CancelledOperation('task pool is closed'));
    }

    const slots = this.slots.splice(0, this.slots.length);
    await Promise.all(
      slots.map((slot) => this.terminate(slot, () => new CancelledOperation('task pool is closed'))),
    );
  }

  /**
   * Starts queued tasks in a microtask, never synchronously from `run`.
   */
  private _scheduleDrain(): void {
    if (this._drainScheduled) {
      return;
    }

    this._drainScheduled = true;
    void Promise.resolve().then(() => {
      this._drainScheduled = false;
      this._drain();
    });
  }

  private _drain(): void {
    while (!this._closed && this._queue.length > 0) {
      const slot = this.idleSlot();
      const task = slot ? this._queue.shift() : undefined;
      if (!slot || !task) {
        return;
      }

      this.start(task, slot);
    }
  }

  private idleSlot(): WorkerSlot | null {
    const idle = this.slots.find((slot) => slot.taskId === null);
    if (idle) {
      return idle;
    }

    return this.slots.length < this._maxConcurrency ? this.spawn() : null;
  }

  private spawn(): WorkerSlot {
    const worker = startWorker(this.workerFile);
    const slot: WorkerSlot = { worker, calls: new Map(), taskId: null };

    worker.on('message', (value: unknown) => {
      if (isWorkerReply(value)) {
        this.handleReply(slot, value);
      } else {
        this.logger.warn('Ignored malformed worker reply', { threadId: worker.threadId });
      }
    });
    worker.on('error', (error: Error) => {
      this.logger.error('Worker thread failed', error, { threadId: worker.threadId });
      this.discard(slot, () => error);
    });
    worker.on('exit', (exitCode: number) => {
      this.discard(slot, () => new Error(`Worker thread exited with code ${exitCode}`));
    });

    // Idle threads must not keep the process running
    worker.unref();
    this.slots.push(slot);
    this.logger.debug('Started worker thread', { threadId: worker.threadId });

    return slot;
  }

  private start(task: QueuedTask<TRequest>, slot: WorkerSlot): void {
    if (task.signal && task.onAbort) {
      task.signal.removeEventListener('abort', task.onAbort);
    }

    task.slot = slot;
    slot.taskId = task.id;
    slot.calls.set(task.id, task);
    slot.worker.ref();
    this.post(slot, task, task.request);
  }

  private post(slot: WorkerSlot, call: PendingCall, request: TRequest): void {
    const envelope: WorkerEnvelope<TRequest> = { id: call.id, request };

    try {
      slot.worker.postMessage(envelope);
    } catch (error) {
      // Values that can't be cloned are rejected before they reach the thread
      this.finish(slot, call.id);
      call.reject(error instanceof Error ? error : new Error(String(error)));
    }
  }

  private handleReply(slot: WorkerSlot, reply: WorkerReply): void {
    const call = slot.calls.get(reply.id);
    if (!call) {
      // Timed out or discarded meanwhile
      return;
    }

    this.finish(slot, reply.id);

    if (reply.success) {
      call.resolve(reply.result);
    } else {
      call.reject(deserializeError(reply.error, call.details));
    }
  }

  /**
   * Frees the call's place on its thread and hands the thread to the next task.
   */
  private finish(slot: WorkerSlot, callId: number): void {
    const call = slot.calls.get(callId);
    slot.calls.delete(callId);

    if (call) {
      this.release(call);
    }

    if (slot.taskId === callId) {
      slot.taskId = null;
      slot.worker.unref();
      this._scheduleDrain();
    }
  }

  private cancelQueued(task: QueuedTask<TRequest>): void {
    const index = this._queue.indexOf(task);
    if (index === -1) {
      return;
    }

    this._queue.splice(index, 1);
    this.release(task);
    task.reject(new CancelledOperation('task was superseded before it started'));
  }

  private expire(task: QueuedTask<TRequest>, timeoutMs: number): void {
    const error = new SourceTimeoutError(timeoutMs, task.details);
    const index = this._queue.indexOf(task);

    if (index !== -1) {
      this._queue.splice(index, 1);
      this.release(task);
      task.reject(error);
      return;
    }

    const { slot } = task;
    if (!slot || !slot.calls.has(task.id)) {
      return;
    }

    this.logger.warn('Task exceeded its deadline, replacing worker thread', {
      threadId: slot.worker.threadId,
      timeoutMs,
      ...task.details,
    });
    this.discard(slot, (call) =>
      call.id === task.id ? error : new CancelledOperation('worker thread was replaced'),
    );
  }

  /**
   * Drops a thread and rejects everything it still owes.
   */
  private discard(slot: WorkerSlot, reasonFor: (call: PendingCall) => Error): void {
    const index = this.slots.indexOf(slot);
    if (index === -1) {
      return;
    }

    this.slots.splice(index, 1);
    this.terminate(slot, reasonFor).catch((error: unknown) => {
      this.logger.warn('Failed to terminate worker thread', { error: String(error) });
    });
    this._scheduleDrain();
  }

  private async terminate(slot: WorkerSlot, reasonFor: (call: PendingCall) => Error): Promise<void> {
    const calls = Array.from(slot.calls.values());
    slot.calls.clear();
    slot.taskId = null;

    for (const call of calls) {
      this.release(call);
      call.reject(reasonFor(call));
    }

    slot.worker.removeAllListeners('message');
    slot.worker.removeAllListeners('exit');
    await slot.worker.terminate();
  }

  private release(task: PendingCall): void {
    if (task.timeoutId !== undefined) {
      clearTimeout(task.timeoutId);
      task.timeoutId = undefined;
    }

    if (task.signal && task.onAbort) {
      task.signal.removeEventListener('abort', task.onAbort);
    }
  }
}
