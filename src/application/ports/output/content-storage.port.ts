export interface PutContentOptions {
  contentType?: string;
  metadata?: Record<string, string>;
}

/**
 * Content Storage Port (Driven Port)
 * Blob store for uploaded documents and transform results
 */
export interface ContentStoragePort {
  /**
   * Store bytes under `name`, overwriting whatever is there.
   * Returns the reference to read them back with.
   */
  put(name: string, content: Buffer, options?: PutContentOptions): Promise<string>;

  get(ref: string): Promise<Buffer>;
}
