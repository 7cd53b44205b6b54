import { describe, expect, it } from 'vitest';

import { formatZodIssues } from '../utils/zod-utils.js';

import { AmountSchema, ClientIdSchema, TransactionIdSchema } from './primitives.js';

describe('ClientIdSchema', () => {
  it('should parse trimmed integer strings', () => {
    expect(ClientIdSchema.parse(' 42 ')).toBe(42);
    expect(ClientIdSchema.parse('0')).toBe(0);
    expect(ClientIdSchema.parse('65535')).toBe(65535);
  });

  it('should reject values outside the unsigned 16-bit range', () => {
    const result = ClientIdSchema.safeParse('65536');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodIssues(result.error)).toBe('client must be at most 65535');
    }
  });

  it('should reject negative and non-numeric ids', () => {
    expect(ClientIdSchema.safeParse('-1').success).toBe(false);
    expect(ClientIdSchema.safeParse('one').success).toBe(false);
    expect(ClientIdSchema.safeParse('').success).toBe(false);
  });

  it('should report a single issue for non-numeric ids', () => {
    const result = ClientIdSchema.safeParse('one');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodIssues(result.error)).toBe('client must be a non-negative integer');
    }
  });
});

describe('TransactionIdSchema', () => {
  it('should accept the full unsigned 32-bit range', () => {
    expect(TransactionIdSchema.parse('4294967295')).toBe(4294967295);
  });

  it('should reject ids beyond the unsigned 32-bit range', () => {
    expect(TransactionIdSchema.safeParse('4294967296').success).toBe(false);
  });
});

describe('AmountSchema', () => {
  it('should transform to a Decimal', () => {
    expect(AmountSchema.parse('50.25').toString()).toBe('50.25');
  });

  it('should surface the amount parser message', () => {
    const result = AmountSchema.safeParse('12.34567');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe("Invalid amount '12.34567': more than 4 fractional digits");
    }
  });
});
