import { Worker, WorkerOptions } from 'worker_threads';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type {
  TransformContext,
  TransformEngine,
} from '../../application/ports/output/transform-engine.port';
import {
  EngineInitializationError,
  TransformError,
  TransformTimeoutError,
} from '../../domain/errors/pipeline.errors';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import {
  EngineMessageType,
  EngineRequest,
  EngineThreadData,
  isEngineResponse,
} from '../interfaces/engine-message.interface';

/**
 * The slice of `worker_threads.Worker` the engine relies on.
 */
export interface EngineThread {
  postMessage(message: EngineRequest): void;
  terminate(): Promise<number>;
  on(event: 'online', listener: () => void): unknown;
  on(event: 'message', listener: (message: unknown) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'exit', listener: (code: number) => void): unknown;
  once(event: 'exit', listener: (code: number) => void): unknown;
  removeAllListeners(): unknown;
}

export type CreateEngineThread = (scriptPath: string, options: WorkerOptions) => EngineThread;

export interface WorkerThreadEngineOptions {
  initTimeoutMs: number;
  /** 0 disables the per-call ceiling. */
  transformTimeoutMs: number;
  minTextRunLength: number;
  shutdownTimeoutMs?: number;
  createThread?: CreateEngineThread;
  scriptPath?: string;
}

interface PendingTransform {
  requestId: string;
  resolve: (text: string) => void;
  reject: (error: Error) => void;
  timer?: NodeJS.Timeout;
}

const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5000;

export const TRANSFORM_THREAD_PATH = path.join(__dirname, '..', 'threads', 'transform-thread.js');

const defaultCreateThread: CreateEngineThread = (scriptPath, options) =>
  new Worker(scriptPath, options);

/**
 * Transform engine backed by one long-lived worker thread.
 *
 * The handle is unhealthy once its thread has crashed, exited or been
 * terminated for running past the transform ceiling; the pool then disposes
 * and replaces it.
 */
export class WorkerThreadEngine implements TransformEngine {
  private healthy = true;
  private disposed = false;
  private pending: PendingTransform | null = null;

  private constructor(
    readonly id: string,
    private readonly thread: EngineThread,
    private readonly options: WorkerThreadEngineOptions,
    private readonly logger: PinoLoggerService,
  ) {
    this.thread.on('message', (message) => this.handleMessage(message));
    this.thread.on('error', (error) => this.handleCrash(`Engine thread crashed: ${error.message}`, error));
    this.thread.on('exit', (code) => {
      if (!this.disposed) {
        this.handleCrash(`Engine thread exited with code ${code}`);
      }
    });
  }

  /**
   * Spawn the thread and wait until it is online.
   */
  static start(
    id: string,
    options: WorkerThreadEngineOptions,
    logger: PinoLoggerService,
  ): Promise<WorkerThreadEngine> {
    const createThread = options.createThread ?? defaultCreateThread;
    const workerData: EngineThreadData = { engineId: id, minTextRunLength: options.minTextRunLength };
    const thread = createThread(options.scriptPath ?? TRANSFORM_THREAD_PATH, { workerData });

    return new Promise((resolve, reject) => {
      const fail = (error: EngineInitializationError) => {
        clearTimeout(timer);
        thread.removeAllListeners();
        thread.terminate().catch((terminateError: unknown) => {
          logger.warn({ engineId: id, error: String(terminateError) }, 'Engine terminate failed');
        });
        reject(error);
      };

      const timer = setTimeout(() => {
        fail(new EngineInitializationError(`Engine ${id} did not come online within ${options.initTimeoutMs}ms`));
      }, options.initTimeoutMs);

      thread.on('online', () => {
        clearTimeout(timer);
        thread.removeAllListeners();
        resolve(new WorkerThreadEngine(id, thread, options, logger));
      });
      thread.on('error', (error) => {
        fail(new EngineInitializationError(`Engine ${id} failed to start: ${error.message}`, error));
      });
      thread.on('exit', (code) => {
        fail(new EngineInitializationError(`Engine ${id} exited during startup with code ${code}`));
      });
    });
  }

  isHealthy(): boolean {
    return this.healthy && !this.disposed;
  }

  transform(content: Buffer, context: TransformContext): Promise<string> {
    if (!this.isHealthy()) {
      return Promise.reject(new TransformError(`Engine ${this.id} is not healthy`));
    }
    if (this.pending) {
      return Promise.reject(new TransformError(`Engine ${this.id} is already serving a request`));
    }

    const requestId = uuidv4();

    return new Promise<string>((resolve, reject) => {
      const pending: PendingTransform = { requestId, resolve, reject };

      if (this.options.transformTimeoutMs > 0) {
        pending.timer = setTimeout(() => this.handleTimeout(requestId), this.options.transformTimeoutMs);
      }

      this.pending = pending;
      this.thread.postMessage({
        type: EngineMessageType.TRANSFORM,
        payload: {
          requestId,
          jobId: context.jobId,
          sourceName: context.sourceName,
          content: new Uint8Array(content),
        },
        timestamp: Date.now(),
      });
    });
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    this.failPending(new TransformError(`Engine ${this.id} was disposed`));

    const shutdownTimeoutMs = this.options.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS;

    await new Promise<void>((resolve) => {
      const timeout = setTimeout(() => {
        this.thread
          .terminate()
          .catch((error: unknown) => {
            this.logger.warn({ engineId: this.id, error: String(error) }, 'Engine terminate failed');
          })
          .finally(() => resolve());
      }, shutdownTimeoutMs);

      this.thread.once('exit', () => {
        clearTimeout(timeout);
        resolve();
      });

      this.thread.postMessage({
        type: EngineMessageType.SHUTDOWN,
        payload: null,
        timestamp: Date.now(),
      });
    });

    this.thread.removeAllListeners();
  }

  private handleMessage(message: unknown): void {
    if (!isEngineResponse(message)) {
      this.logger.warn({ engineId: this.id }, 'Ignoring unexpected engine thread message');
      return;
    }

    const pending = this.pending;
    if (!pending || pending.requestId !== message.payload.requestId) {
      this.logger.debug(
        { engineId: this.id, requestId: message.payload.requestId },
        'Dropping reply for a request that is no longer pending',
      );
      return;
    }

    clearTimeout(pending.timer);
    this.pending = null;

    if (message.type === EngineMessageType.TRANSFORM_COMPLETED) {
      pending.resolve(message.payload.text);
    } else {
      pending.reject(new TransformError(message.payload.error.message));
    }
  }

  private handleTimeout(requestId: string): void {
    if (this.pending?.requestId !== requestId) return;

    this.healthy = false;
    this.failPending(new TransformTimeoutError(this.options.transformTimeoutMs));
    this.logger.warn({ engineId: this.id }, 'Transform timed out, terminating engine thread');

    this.thread.terminate().catch((error: unknown) => {
      this.logger.warn({ engineId: this.id, error: String(error) }, 'Engine terminate failed');
    });
  }

  private handleCrash(message: string, cause?: Error): void {
    if (this.healthy) {
      this.logger.error({ engineId: this.id, error: message }, 'Engine thread failed');
    }
    this.healthy = false;
    this.failPending(new TransformError(message, cause));
  }

  private failPending(error: Error): void {
    const pending = this.pending;
    if (!pending) return;

    clearTimeout(pending.timer);
    this.pending = null;
    pending.reject(error);
  }
}
