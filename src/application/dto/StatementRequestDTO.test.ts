import { describe, expect, it } from 'vitest';
import { parseStatementOptions, StatementTextRequestSchema } from './StatementRequestDTO.js';

describe('parseStatementOptions', () => {
  it('should build a period from both bounds', () => {
    expect(parseStatementOptions({ periodStart: '2025-06-01', periodEnd: '2025-06-30' })).toEqual({
      period: { start: '2025-06-01', end: '2025-06-30' },
      referenceDate: undefined,
    });
  });

  it('should accept a missing body', () => {
    expect(parseStatementOptions(undefined)).toEqual({ period: undefined, referenceDate: undefined });
  });

  it('should refuse half a period or a reversed one', () => {
    expect(() => parseStatementOptions({ periodStart: '2025-06-01' })).toThrow('periodStart and periodEnd must be provided together');
    expect(() => parseStatementOptions({ periodStart: '2025-06-30', periodEnd: '2025-06-01' })).toThrow(
      'periodStart must not be after periodEnd',
    );
  });
});

describe('StatementTextRequestSchema', () => {
  it('should require the statement text', () => {
    expect(StatementTextRequestSchema.safeParse({ referenceDate: '2025-07-01' }).success).toBe(false);
    expect(StatementTextRequestSchema.parse({ text: 'x', referenceDate: '2025-07-01' })).toEqual({
      text: 'x',
      referenceDate: '2025-07-01',
    });
  });
});
