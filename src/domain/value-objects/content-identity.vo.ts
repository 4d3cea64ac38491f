import { createHash } from 'crypto';
import { InvalidInputError } from '../errors/pipeline.errors';

const IDENTITY_PATTERN = /^[0-9a-f]{64}$/;

/**
 * Content-derived job identity: SHA-256 of the raw bytes, lower-case hex.
 * Doubles as the idempotency key for the whole pipeline.
 */
export type Identity = string;

export function identityOf(content: Uint8Array): Identity {
  return createHash('sha256').update(content).digest('hex');
}

export class ContentIdentity {
  private constructor(private readonly _value: Identity) {}

  /**
   * Accept a caller-supplied job id, ignoring case and surrounding whitespace.
   */
  static fromString(value: string): ContentIdentity {
    const normalized = value.trim().toLowerCase();
    if (!ContentIdentity.isValid(normalized)) {
      throw new InvalidInputError(`Invalid job id: ${value}`);
    }
    return new ContentIdentity(normalized);
  }

  static isValid(value: string): boolean {
    return IDENTITY_PATTERN.test(value);
  }

  get value(): Identity {
    return this._value;
  }
}
