/**
 * Transform Thread Entry Point
 *
 * Runs inside the worker thread owned by one `WorkerThreadEngine`. The thread
 * is long-lived: it serves TRANSFORM requests one at a time until it receives
 * SHUTDOWN or is terminated.
 *
 * Task-level errors are reported as TRANSFORM_FAILED. Anything that escapes
 * (uncaught exception, unhandled rejection) exits the thread with code 1; the
 * engine sees the exit, fails the in-flight call and reports itself unhealthy
 * so the pool replaces it.
 *
 * @module TransformThread
 */

import { parentPort, workerData } from 'worker_threads';
import {
  EngineMessage,
  EngineMessageType,
  EngineThreadData,
  TransformCompletedPayload,
  TransformFailedPayload,
  TransformRequestPayload,
  isEngineRequest,
} from '../interfaces/engine-message.interface';
import { extractText } from './text-extractor';

function readThreadData(data: unknown): EngineThreadData {
  const engineId =
    typeof data === 'object' && data !== null && 'engineId' in data && typeof data.engineId === 'string'
      ? data.engineId
      : 'engine-unknown';
  const minTextRunLength =
    typeof data === 'object' &&
    data !== null &&
    'minTextRunLength' in data &&
    typeof data.minTextRunLength === 'number'
      ? data.minTextRunLength
      : 3;
  return { engineId, minTextRunLength };
}

const threadData = readThreadData(workerData);

function sendMessage<T>(type: EngineMessageType, payload: T): void {
  const message: EngineMessage<T> = {
    type,
    payload,
    timestamp: Date.now(),
  };
  parentPort?.postMessage(message);
}

function handleTransform(payload: TransformRequestPayload): void {
  const startTime = Date.now();

  try {
    const text = extractText(payload.content, threadData.minTextRunLength);
    sendMessage<TransformCompletedPayload>(EngineMessageType.TRANSFORM_COMPLETED, {
      requestId: payload.requestId,
      text,
      processingTimeMs: Date.now() - startTime,
    });
  } catch (error) {
    sendMessage<TransformFailedPayload>(EngineMessageType.TRANSFORM_FAILED, {
      requestId: payload.requestId,
      error: { message: error instanceof Error ? error.message : String(error) },
      processingTimeMs: Date.now() - startTime,
    });
  }
}

parentPort?.on('message', (message: unknown) => {
  if (!isEngineRequest(message)) {
    console.error(`[${threadData.engineId}] Ignoring unknown message`);
    return;
  }

  switch (message.type) {
    case EngineMessageType.TRANSFORM:
      handleTransform(message.payload);
      break;

    case EngineMessageType.SHUTDOWN:
      process.exit(0);
  }
});

process.on('uncaughtException', (error) => {
  console.error(`[${threadData.engineId}] Uncaught exception in transform thread:`, error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  console.error(`[${threadData.engineId}] Unhandled rejection in transform thread:`, reason);
  process.exit(1);
});
