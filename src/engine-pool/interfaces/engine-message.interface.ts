/**
 * Engine Thread Communication Protocol
 *
 * Messages exchanged between a `WorkerThreadEngine` (main thread) and its
 * dedicated transform thread.
 *
 * - **Main → Thread**: TRANSFORM, SHUTDOWN
 * - **Thread → Main**: TRANSFORM_COMPLETED, TRANSFORM_FAILED
 *
 * ```
 * Main Thread                Transform Thread
 *     |---TRANSFORM------------------>|
 *     |                               | (extracts text)
 *     |<-----------TRANSFORM_COMPLETED|
 *     |---SHUTDOWN------------------->|
 *     |                               | (exits)
 * ```
 *
 * A handle serves one request at a time; `requestId` lets the engine drop a
 * late reply that belongs to a request it already gave up on.
 *
 * @module EngineMessageInterface
 */

export enum EngineMessageType {
  TRANSFORM = 'TRANSFORM',
  TRANSFORM_COMPLETED = 'TRANSFORM_COMPLETED',
  TRANSFORM_FAILED = 'TRANSFORM_FAILED',
  SHUTDOWN = 'SHUTDOWN',
}

export interface EngineMessage<T = unknown> {
  type: EngineMessageType;
  payload: T;
  timestamp: number;
}

export interface TransformRequestPayload {
  requestId: string;
  jobId: string;
  sourceName: string;
  /** Structured-cloned across the thread boundary. */
  content: Uint8Array;
}

export interface TransformCompletedPayload {
  requestId: string;
  text: string;
  processingTimeMs: number;
}

export interface TransformFailedPayload {
  requestId: string;
  error: {
    message: string;
  };
  processingTimeMs: number;
}

/** Data handed to the thread at spawn time via `workerData`. */
export interface EngineThreadData {
  engineId: string;
  minTextRunLength: number;
}

export type EngineResponse =
  | (EngineMessage<TransformCompletedPayload> & { type: EngineMessageType.TRANSFORM_COMPLETED })
  | (EngineMessage<TransformFailedPayload> & { type: EngineMessageType.TRANSFORM_FAILED });

export type EngineRequest =
  | (EngineMessage<TransformRequestPayload> & { type: EngineMessageType.TRANSFORM })
  | (EngineMessage<null> & { type: EngineMessageType.SHUTDOWN });

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function isEngineResponse(value: unknown): value is EngineResponse {
  if (!isRecord(value) || !isRecord(value.payload)) return false;
  if (typeof value.payload.requestId !== 'string') return false;

  if (value.type === EngineMessageType.TRANSFORM_COMPLETED) {
    return typeof value.payload.text === 'string';
  }
  if (value.type === EngineMessageType.TRANSFORM_FAILED) {
    return isRecord(value.payload.error) && typeof value.payload.error.message === 'string';
  }
  return false;
}

export function isEngineRequest(value: unknown): value is EngineRequest {
  if (!isRecord(value)) return false;
  if (value.type === EngineMessageType.SHUTDOWN) return true;
  if (value.type !== EngineMessageType.TRANSFORM || !isRecord(value.payload)) return false;
  return (
    typeof value.payload.requestId === 'string' && value.payload.content instanceof Uint8Array
  );
}
