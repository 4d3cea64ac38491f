import type { TransformEngine } from './transform-engine.port';

export interface EnginePoolStats {
  size: number;
  idle: number;
  checkedOut: number;
  waiting: number;
  totalAcquisitions: number;
  acquireTimeouts: number;
  replacements: number;
}

/**
 * Engine Pool Port (Driven Port)
 * Bounded, FIFO-fair pool of transform engine handles
 */
export interface EnginePoolPort {
  /**
   * Check out a handle, waiting up to `timeoutMs` (pool default when omitted).
   * Rejects with `PoolExhaustedError` on expiry.
   */
  acquire(timeoutMs?: number): Promise<TransformEngine>;

  /** Return a handle. Must be called exactly once per acquire. */
  release(engine: TransformEngine): void;

  /**
   * Acquire, run `fn`, release in all cases.
   */
  run<T>(fn: (engine: TransformEngine) => Promise<T>, timeoutMs?: number): Promise<T>;

  getStats(): EnginePoolStats;
}
