import { extname, join } from 'path';

import { DebugLogger, getLogger } from '../engines/debug-logger';
import { RunOptions, TaskPool } from '../engines/task-pool';
import { getMaxWorkers } from '../models/app-config';
import type { SourceWorkerRequest, SourceWorkerResult } from '../workers/source-worker';

export type SourceTaskPool = TaskPool<SourceWorkerRequest>;

/**
 * The worker entry beside this module, compiled or not.
 */
export const SOURCE_WORKER_FILE = join(__dirname, '..', 'workers', `source-worker${extname(__filename)}`);

export function createSourceTaskPool(
  options: { maxConcurrency?: number; logger?: DebugLogger } = {},
): SourceTaskPool {
  return new TaskPool<SourceWorkerRequest>({
    workerFile: SOURCE_WORKER_FILE,
    maxConcurrency: options.maxConcurrency ?? getMaxWorkers(),
    logger: options.logger ?? getLogger('pool'),
  });
}

let sharedPool: SourceTaskPool | null = null;

/**
 * Process wide pool used by sources that aren't given one, sized by
 * `TABULAR_PAGER_MAX_WORKERS`.
 */
export function getSharedSourceTaskPool(): SourceTaskPool {
  if (!sharedPool || sharedPool.closed) {
    sharedPool = createSourceTaskPool();
  }
  return sharedPool;
}

export async function closeSharedSourceTaskPool(): Promise<void> {
  const pool = sharedPool;
  sharedPool = null;
  await pool?.close();
}

/**
 * Runs a request on a source worker thread, typed by the request kind.
 */
export function runSourceTask<R extends SourceWorkerRequest>(
  pool: SourceTaskPool,
  request: R,
  options: RunOptions = {},
): Promise<SourceWorkerResult<R>> {
  return pool.run<SourceWorkerResult<R>>(request, options);
}
