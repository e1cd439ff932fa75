import { describe, expect, it } from 'vitest';
import { promoteCandidate, retag, sortByDate } from './TransactionPromoter.js';

const context = { period: { start: '2025-06-01', end: '2025-06-30' }, referenceDate: '2025-07-02' };

describe('promoteCandidate', () => {
  it('should build a canonical record', () => {
    const result = promoteCandidate({ date: '06/12', amount: '-50.93', description: '  TARGET   T-9801 ' }, 'model', context);

    expect(result).toEqual({
      ok: true,
      record: { date: '2025-06-12', amount: -50.93, description: 'TARGET T-9801', sourceConfidence: 'model' },
    });
  });

  it.each([
    [{ date: '06/12', amount: 5, description: '   ' }, 'empty_description'],
    [{ date: 'soon', amount: 5, description: 'X' }, 'invalid_date'],
    [{ date: '2025-05-31', amount: 5, description: 'X' }, 'outside_period'],
    [{ date: '06/12', amount: 'n/a', description: 'X' }, 'invalid_amount'],
    [{ date: '06/12', amount: '0.00', description: 'X' }, 'zero_amount'],
  ])('should reject %o with %s', (candidate, reason) => {
    const result = promoteCandidate(candidate, 'pattern', context);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.rejection.reason).toBe(reason);
    }
  });
});

describe('sortByDate', () => {
  it('should keep document order for records on the same date', () => {
    const sorted = sortByDate([
      { date: '2025-06-03', id: 'a' },
      { date: '2025-06-01', id: 'b' },
      { date: '2025-06-03', id: 'c' },
      { date: '2025-06-01', id: 'd' },
    ]);

    expect(sorted.map((record) => record.id)).toEqual(['b', 'd', 'a', 'c']);
  });
});

describe('retag', () => {
  it('should set the extraction source on every record', () => {
    const records = retag(
      [{ date: '2025-06-01', amount: 1, description: 'A', sourceConfidence: 'model' }],
      'pattern',
    );

    expect(records[0].sourceConfidence).toBe('pattern');
  });
});
