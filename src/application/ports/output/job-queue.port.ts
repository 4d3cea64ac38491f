/**
 * Body of a work message, in domain naming. The wire format is snake_case
 * (see `WorkMessageDto`).
 */
export interface WorkMessage {
  jobId: string;
  contentRef: string;
  sourceName: string;
  createdAt: string;
  sizeBytes: number;
}

/**
 * A message received under a lease. The lease holds the message invisible to
 * other consumers until it is completed, abandoned or expires.
 */
export interface LeasedMessage {
  messageId: string;
  /** Raw body, validated by the consumer. */
  body: string;
  /** Opaque token identifying this lease (SQS receipt handle). */
  leaseId: string;
  /** Number of earlier deliveries of this message; 0 on first delivery. */
  deliveryCount: number;
}

/**
 * Terminal failure record sent to the poison destination.
 */
export interface PoisonRecord {
  originalMessageId: string;
  originalBody: string;
  jobId?: string;
  errorCode: string;
  errorDetail: string;
  deliveryCount: number;
  failedAt: string;
}

/**
 * Job Queue Port (Driven Port)
 * At-least-once work queue with leases and a poison destination
 */
export interface JobQueuePort {
  /**
   * Enqueue a work message. The message id is the job identity.
   * Returns the broker's message id.
   */
  send(message: WorkMessage): Promise<string>;

  /**
   * Lease up to `maxCount` messages, waiting at most `maxWaitSeconds`.
   * Returns an empty array rather than blocking indefinitely.
   */
  receive(maxCount: number, maxWaitSeconds: number): Promise<LeasedMessage[]>;

  /** Acknowledge: the message will not be delivered again. */
  complete(lease: LeasedMessage): Promise<void>;

  /** Hand the message back for immediate redelivery. */
  abandon(lease: LeasedMessage): Promise<void>;

  publishPoison(record: PoisonRecord): Promise<void>;
}
