import {
  Inject,
  Injectable,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { setTimeout as sleep } from 'timers/promises';
import { AppConfig } from '../config/configuration';
import { PinoLoggerService } from '../shared/logging/pino-logger.service';
import type { ProcessJobOutcome } from '../application/ports/input/process-job.port';
import type { JobQueuePort, LeasedMessage } from '../application/ports/output/job-queue.port';
import { JOB_QUEUE_PORT } from '../infrastructure/injection-tokens';
import { ProcessJobUseCase } from '../application/use-cases/process-job.use-case';
import type { SchedulerStats } from './interfaces/scheduler-stats.interface';

/**
 * Job Scheduler
 *
 * Keeps at most `concurrency` leases in flight. Each loop iteration either
 * waits for a slot to free up or receives `min(freeSlots, batchSize)`
 * messages and dispatches them without waiting for their result.
 */
@Injectable()
export class JobSchedulerService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger: PinoLoggerService;
  private readonly config: AppConfig['scheduler'];
  private readonly inFlight = new Map<string, Promise<void>>();
  private loop: Promise<void> | null = null;
  private running = false;
  /** Settles when stop is requested, so a parked loop wakes up at once. */
  private stopRequested: Promise<void> = Promise.resolve();
  private requestStop: () => void = () => undefined;

  private dispatched = 0;
  private readonly outcomes: Record<ProcessJobOutcome, number> = {
    completed: 0,
    retried: 0,
    poisoned: 0,
    skipped: 0,
  };

  constructor(
    @Inject(JOB_QUEUE_PORT) private readonly jobQueue: JobQueuePort,
    private readonly processJob: ProcessJobUseCase,
    configService: ConfigService<AppConfig>,
    logger: PinoLoggerService,
  ) {
    this.config = configService.getOrThrow('scheduler', { infer: true });
    this.logger = logger.forContext(JobSchedulerService.name);
  }

  onApplicationBootstrap(): void {
    if (!this.config.enabled) {
      this.logger.info('Scheduler disabled, not consuming the jobs queue');
      return;
    }
    this.start();
  }

  async onModuleDestroy(): Promise<void> {
    await this.stop();
  }

  start(): void {
    if (this.running) return;

    this.running = true;
    this.stopRequested = new Promise<void>((resolve) => {
      this.requestStop = resolve;
    });
    this.logger.info(
      { concurrency: this.config.concurrency, batchSize: this.config.receiveBatchSize },
      'Scheduler started',
    );
    this.loop = this.run();
  }

  /**
   * Stop receiving and wait up to the drain timeout for in-flight jobs.
   * The timeout covers both the loop exit and the drain. Jobs still running
   * afterwards keep their leases until they expire.
   */
  async stop(): Promise<void> {
    if (!this.running && !this.loop) return;

    const deadline = Date.now() + this.config.drainTimeoutMs;
    this.running = false;
    this.requestStop();
    this.logger.info({ inFlight: this.inFlight.size }, 'Stopping scheduler, draining in-flight jobs');

    let loopExited = true;
    if (this.loop) {
      loopExited = await this.settlesBefore(this.loop, deadline);
      if (loopExited) this.loop = null;
    }

    const drained =
      loopExited &&
      (this.inFlight.size === 0 ||
        (await this.settlesBefore(Promise.allSettled(this.inFlight.values()), deadline)));
    if (drained) {
      this.logger.info('Scheduler stopped, all in-flight jobs finished');
    } else {
      this.logger.warn(
        { inFlight: this.inFlight.size, drainTimeoutMs: this.config.drainTimeoutMs },
        'Drain timeout reached, remaining leases will expire and be redelivered',
      );
    }
  }

  getStats(): SchedulerStats {
    return {
      running: this.running,
      concurrency: this.config.concurrency,
      inFlight: this.inFlight.size,
      dispatched: this.dispatched,
      ...this.outcomes,
    };
  }

  private async run(): Promise<void> {
    while (this.running) {
      const freeSlots = this.config.concurrency - this.inFlight.size;
      if (freeSlots <= 0) {
        await Promise.race([this.stopRequested, ...this.inFlight.values()]);
        continue;
      }

      let leases: LeasedMessage[];
      try {
        leases = await this.jobQueue.receive(
          Math.min(freeSlots, this.config.receiveBatchSize),
          this.config.receiveWaitSeconds,
        );
      } catch (error) {
        this.logger.error(
          { error: error instanceof Error ? error.message : String(error) },
          'Failed to receive from jobs queue, backing off',
        );
        const backoff = new AbortController();
        await Promise.race([
          sleep(this.config.receiveErrorBackoffMs, undefined, { signal: backoff.signal }).catch(
            () => undefined,
          ),
          this.stopRequested,
        ]);
        backoff.abort();
        continue;
      }

      for (const lease of leases) {
        if (this.running) {
          this.dispatch(lease);
        } else {
          await this.release(lease);
        }
      }
    }
  }

  private dispatch(lease: LeasedMessage): void {
    this.dispatched++;
    const task = this.handle(lease).finally(() => {
      this.inFlight.delete(lease.leaseId);
    });
    this.inFlight.set(lease.leaseId, task);
  }

  private async handle(lease: LeasedMessage): Promise<void> {
    const messageLogger = this.logger.forMessage(lease.messageId, lease.deliveryCount);
    try {
      const result = await this.processJob.execute(lease);
      this.outcomes[result.outcome]++;
      messageLogger.debug(
        { jobId: result.jobId, outcome: result.outcome },
        'Message handled',
      );
    } catch (error) {
      // The lease is left to expire so the broker redelivers it
      messageLogger.error(
        { err: error },
        'Unexpected error while processing message',
      );
    }
  }

  /**
   * Received after stop was requested: hand it straight back.
   */
  private async release(lease: LeasedMessage): Promise<void> {
    try {
      await this.jobQueue.abandon(lease);
    } catch (error) {
      this.logger.warn(
        { messageId: lease.messageId, error: error instanceof Error ? error.message : String(error) },
        'Could not release lease received during shutdown',
      );
    }
  }

  /**
   * Whether `work` settles before `deadline` (epoch ms).
   */
  private async settlesBefore(work: Promise<unknown>, deadline: number): Promise<boolean> {
    const controller = new AbortController();
    const remaining = Math.max(deadline - Date.now(), 0);
    const timeout = sleep(remaining, false, { signal: controller.signal }).catch(() => false);
    const done = work.then(
      () => true,
      () => true,
    );

    try {
      return await Promise.race([done, timeout]);
    } finally {
      controller.abort();
    }
  }
}
