import { parentPort } from 'worker_threads';

import { serializeError } from '../../src/engines/errors';
import type { WorkerEnvelope, WorkerErrorReply, WorkerSuccessReply } from '../../src/engines/task-pool';

export type TestWorkerRequest =
  | { type: 'echo'; value: string }
  | { type: 'spin'; ms: number }
  | { type: 'fail'; message: string }
  | { type: 'mark'; value: string }
  | { type: 'read' };

let marked: string | null = null;

// Blocks the thread like a long synchronous query
function spin(ms: number): number {
  const until = Date.now() + ms;
  while (Date.now() < until) {
    // busy
  }
  return ms;
}

function handle(request: TestWorkerRequest): unknown {
  switch (request.type) {
    case 'echo':
      return request.value;
    case 'spin':
      return spin(request.ms);
    case 'fail':
      throw new RangeError(request.message);
    case 'mark':
      marked = request.value;
      return true;
    case 'read':
      return marked;
    default: {
      const _: never = request;
      return _;
    }
  }
}

const port = parentPort;

if (port) {
  port.on('message', (envelope: WorkerEnvelope<TestWorkerRequest>) => {
    try {
      port.postMessage({
        id: envelope.id,
        success: true,
        result: handle(envelope.request),
      } satisfies WorkerSuccessReply);
    } catch (error) {
      port.postMessage({
        id: envelope.id,
        success: false,
        error: serializeError(error),
      } satisfies WorkerErrorReply);
    }
  });
}
