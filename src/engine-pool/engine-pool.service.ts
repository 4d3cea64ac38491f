import { Inject, Injectable, OnApplicationShutdown, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../config/configuration';
import type {
  EnginePoolPort,
  EnginePoolStats,
} from '../application/ports/output/engine-pool.port';
import type {
  TransformEngine,
  TransformEngineFactory,
} from '../application/ports/output/transform-engine.port';
import {
  EngineInitializationError,
  PoolExhaustedError,
  TransformError,
} from '../domain/errors/pipeline.errors';
import { TRANSFORM_ENGINE_FACTORY } from '../infrastructure/injection-tokens';
import { PinoLoggerService } from '../shared/logging/pino-logger.service';

/**
 * A caller blocked in `acquire` until a handle is handed back or its
 * deadline passes.
 */
interface Waiter {
  resolve: (engine: TransformEngine) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * Engine Pool Service
 *
 * Owns a fixed set of transform engine handles created once at startup and
 * lends them out one caller at a time.
 *
 * ## Guarantees
 *
 * - At most `size` handles are checked out at any moment; no handle is held
 *   by two callers.
 * - Waiters are served strictly in arrival order. A returned handle goes to
 *   the oldest waiter before it goes back to the idle list.
 * - `acquire` never blocks forever: past its deadline it rejects with
 *   `PoolExhaustedError` and the waiter leaves the queue.
 * - `run` releases the handle whatever the callback does.
 *
 * ## Unhealthy handles
 *
 * A released handle that reports `isHealthy() === false` is disposed and a
 * replacement is created through the factory. If that fails the pool keeps
 * running one handle short; the failure is logged.
 *
 * ## Lifecycle
 *
 * Handles are created concurrently in `onModuleInit`. If any of them fails,
 * the ones that did start are disposed and startup fails with
 * `EngineInitializationError`. `onApplicationShutdown` rejects pending
 * waiters and disposes every handle; it runs after the scheduler has drained
 * in `onModuleDestroy`.
 */
@Injectable()
export class EnginePoolService implements EnginePoolPort, OnModuleInit, OnApplicationShutdown {
  private idle: TransformEngine[] = [];
  private readonly checkedOut = new Set<TransformEngine>();
  private waiters: Waiter[] = [];

  private readonly size: number;
  private readonly acquireTimeoutMs: number;
  private readonly logger: PinoLoggerService;

  private isShuttingDown = false;
  private nextEngineIndex = 0;

  private totalAcquisitions = 0;
  private acquireTimeouts = 0;
  private replacements = 0;

  constructor(
    private readonly configService: ConfigService<AppConfig>,
    @Inject(TRANSFORM_ENGINE_FACTORY) private readonly engineFactory: TransformEngineFactory,
    logger: PinoLoggerService,
  ) {
    const poolConfig = this.configService.getOrThrow('enginePool', { infer: true });
    this.size = poolConfig.size;
    this.acquireTimeoutMs = poolConfig.acquireTimeoutMs;
    this.logger = logger.forContext(EnginePoolService.name);
  }

  async onModuleInit(): Promise<void> {
    await this.initialize();
  }

  async onApplicationShutdown(): Promise<void> {
    await this.shutdown();
  }

  async initialize(): Promise<void> {
    this.logger.info({ poolSize: this.size }, 'Initializing engine pool');

    const results = await Promise.allSettled(
      Array.from({ length: this.size }, () => this.engineFactory.create(this.nextEngineId())),
    );

    const started: TransformEngine[] = [];
    const failures: unknown[] = [];
    for (const result of results) {
      if (result.status === 'fulfilled') {
        started.push(result.value);
      } else {
        failures.push(result.reason);
      }
    }

    if (failures.length > 0) {
      await Promise.allSettled(started.map((engine) => engine.dispose()));
      const first = failures[0];
      throw new EngineInitializationError(
        `${failures.length} of ${this.size} engines failed to start: ${
          first instanceof Error ? first.message : String(first)
        }`,
        first,
      );
    }

    this.idle = started;
    this.logger.info({ poolSize: this.size }, 'Engine pool initialized');
  }

  acquire(timeoutMs: number = this.acquireTimeoutMs): Promise<TransformEngine> {
    if (this.isShuttingDown) {
      return Promise.reject(new TransformError('Engine pool is shutting down'));
    }

    const engine = this.idle.shift();
    if (engine) {
      this.checkOut(engine);
      return Promise.resolve(engine);
    }

    return new Promise<TransformEngine>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        timer: setTimeout(() => {
          this.waiters = this.waiters.filter((candidate) => candidate !== waiter);
          this.acquireTimeouts++;
          reject(new PoolExhaustedError(timeoutMs, this.size));
        }, timeoutMs),
      };
      this.waiters.push(waiter);
      this.logger.debug({ waiting: this.waiters.length }, 'Waiting for a transform engine');
    });
  }

  release(engine: TransformEngine): void {
    if (!this.checkedOut.delete(engine)) {
      this.logger.warn({ engineId: engine.id }, 'Ignoring release of an engine that is not checked out');
      return;
    }

    if (this.isShuttingDown) {
      return;
    }

    if (!engine.isHealthy()) {
      this.replace(engine);
      return;
    }

    this.handOff(engine);
  }

  async run<T>(fn: (engine: TransformEngine) => Promise<T>, timeoutMs?: number): Promise<T> {
    const engine = await this.acquire(timeoutMs);
    try {
      return await fn(engine);
    } finally {
      this.release(engine);
    }
  }

  getStats(): EnginePoolStats {
    return {
      size: this.size,
      idle: this.idle.length,
      checkedOut: this.checkedOut.size,
      waiting: this.waiters.length,
      totalAcquisitions: this.totalAcquisitions,
      acquireTimeouts: this.acquireTimeouts,
      replacements: this.replacements,
    };
  }

  async shutdown(): Promise<void> {
    if (this.isShuttingDown) return;

    this.isShuttingDown = true;
    this.logger.info('Shutting down engine pool');

    for (const waiter of this.waiters) {
      clearTimeout(waiter.timer);
      waiter.reject(new TransformError('Engine pool is shutting down'));
    }
    this.waiters = [];

    const engines = [...this.idle, ...this.checkedOut];
    this.idle = [];

    const results = await Promise.allSettled(engines.map((engine) => engine.dispose()));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.logger.warn(
          { engineId: engines[index].id, error: String(result.reason) },
          'Engine dispose failed',
        );
      }
    });

    this.logger.info('Engine pool shut down');
  }

  private checkOut(engine: TransformEngine): void {
    this.checkedOut.add(engine);
    this.totalAcquisitions++;
  }

  private handOff(engine: TransformEngine): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      this.checkOut(engine);
      waiter.resolve(engine);
      return;
    }
    this.idle.push(engine);
  }

  private replace(engine: TransformEngine): void {
    this.replacements++;
    this.logger.warn({ engineId: engine.id }, 'Replacing unhealthy engine');

    engine.dispose().catch((error: unknown) => {
      this.logger.warn({ engineId: engine.id, error: String(error) }, 'Engine dispose failed');
    });

    this.engineFactory
      .create(this.nextEngineId())
      .then(async (replacement) => {
        if (this.isShuttingDown) {
          await replacement.dispose();
          return;
        }
        this.handOff(replacement);
      })
      .catch((error: unknown) => {
        this.logger.error(
          { engineId: engine.id, error: error instanceof Error ? error.message : String(error) },
          'Failed to create replacement engine, pool capacity reduced',
        );
      });
  }

  private nextEngineId(): string {
    return `engine-${this.nextEngineIndex++}`;
  }
}
