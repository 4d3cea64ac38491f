import { describe, it, expect } from 'vitest';
import {
  ContentIdentity,
  identityOf,
} from '../../../src/domain/value-objects/content-identity.vo';
import { InvalidInputError } from '../../../src/domain/errors/pipeline.errors';

const ABC_SHA256 = 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad';

describe('ContentIdentity', () => {
  describe('identityOf', () => {
    it('should return the lower-case SHA-256 hex digest of the bytes', () => {
      expect(identityOf(Buffer.from('abc'))).toBe(ABC_SHA256);
    });

    it('should depend on content only', () => {
      const first = identityOf(new Uint8Array([1, 2, 3]));
      const second = identityOf(Buffer.from([1, 2, 3]));

      expect(first).toBe(second);
      expect(identityOf(Buffer.from([1, 2, 4]))).not.toBe(first);
    });
  });

  describe('fromString', () => {
    it('should normalise case and surrounding whitespace', () => {
      const identity = ContentIdentity.fromString(`  ${ABC_SHA256.toUpperCase()} `);

      expect(identity.value).toBe(ABC_SHA256);
      expect(identity.value).toBe(identityOf(Buffer.from('abc')));
    });

    it('should reject anything that is not a 64 character hex digest', () => {
      expect(() => ContentIdentity.fromString('abc')).toThrow(
        new InvalidInputError('Invalid job id: abc'),
      );
      expect(ContentIdentity.isValid(`${ABC_SHA256.slice(0, 63)}g`)).toBe(false);
    });
  });
});
