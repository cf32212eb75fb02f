/**
 * @fileoverview Worker identity for worker-affine resources.
 *
 * A worker lane names a long-lived unit of execution, such as the publisher
 * daemon's loop. Code running inside `runInWorkerLane(id, ...)`, including
 * its async continuations, reports `id` from `currentWorkerId()`. Outside any
 * lane the identity is the Node.js thread (`thread-0` on the main thread,
 * `thread-<n>` in a `worker_threads` worker).
 * @module src/ambient/workerLane
 */
import { AsyncLocalStorage } from 'async_hooks';
import { threadId } from 'worker_threads';

import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';

const laneStorage = new AsyncLocalStorage<string>();

export function runInWorkerLane<T>(workerId: string, body: () => T): T {
  if (workerId.trim() === '') {
    throw new McpError(
      JsonRpcErrorCode.ValidationError,
      'A worker lane requires a non-empty id.',
    );
  }
  return laneStorage.run(workerId, body);
}

export function currentWorkerId(): string {
  return laneStorage.getStore() ?? `thread-${threadId}`;
}
