export interface TransformContext {
  jobId: string;
  sourceName: string;
}

/**
 * An expensive, stateful engine handle. A handle serves one transform at a
 * time; the engine pool guarantees that.
 */
export interface TransformEngine {
  readonly id: string;

  transform(content: Buffer, context: TransformContext): Promise<string>;

  /** False once the handle must not serve further work. */
  isHealthy(): boolean;

  dispose(): Promise<void>;
}

export interface TransformEngineFactory {
  create(engineId: string): Promise<TransformEngine>;
}
