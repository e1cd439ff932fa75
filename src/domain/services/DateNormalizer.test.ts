import { describe, expect, it } from 'vitest';
import { inferYear, isWithinPeriod, normalizeDate, toIsoDate } from './DateNormalizer.js';

const june2025 = { period: { start: '2025-06-01', end: '2025-06-30' }, referenceDate: '2026-02-01' };
const yearEnd = { period: { start: '2024-12-15', end: '2025-01-14' }, referenceDate: '2026-02-01' };

describe('normalizeDate', () => {
  it('should take the year of the statement period for MM/DD dates', () => {
    expect(normalizeDate('06/12', june2025)).toBe('2025-06-12');
  });

  it('should roll December lines back a year on a statement ending in January', () => {
    expect(normalizeDate('12/28', yearEnd)).toBe('2024-12-28');
    expect(normalizeDate('01/03', yearEnd)).toBe('2025-01-03');
  });

  it('should anchor on the reference date when the period is unknown', () => {
    expect(normalizeDate('03/01', { referenceDate: '2025-03-10' })).toBe('2025-03-01');
    expect(normalizeDate('04/01', { referenceDate: '2025-03-10' })).toBe('2024-04-01');
  });

  it('should expand two-digit years into the 2000s', () => {
    expect(normalizeDate('06/12/25', june2025)).toBe('2025-06-12');
  });

  it('should keep explicit years as written', () => {
    expect(normalizeDate('2023-11-05', june2025)).toBe('2023-11-05');
    expect(normalizeDate('11/05/2023', june2025)).toBe('2023-11-05');
  });

  it('should read month-name dates', () => {
    expect(normalizeDate('Jun 12, 2025', june2025)).toBe('2025-06-12');
    expect(normalizeDate('June 3', june2025)).toBe('2025-06-03');
    expect(normalizeDate('12 Jun 2025', june2025)).toBe('2025-06-12');
  });

  it('should return null for impossible or unreadable dates', () => {
    expect(normalizeDate('2025-06-31', june2025)).toBeNull();
    expect(normalizeDate('13/01', june2025)).toBeNull();
    expect(normalizeDate('Foo 12', june2025)).toBeNull();
  });

  it('should not read words that start with a month abbreviation as dates', () => {
    expect(normalizeDate('MARKET 5', june2025)).toBeNull();
    expect(normalizeDate('Mayfield 3', june2025)).toBeNull();
    expect(normalizeDate('DECATUR 30', june2025)).toBeNull();
    expect(normalizeDate('Sept 3, 2024', june2025)).toBe('2024-09-03');
    expect(normalizeDate('yesterday', june2025)).toBeNull();
  });
});

describe('inferYear', () => {
  it('should keep the anchor year for a date on the anchor itself', () => {
    expect(inferYear(1, 14, yearEnd)).toBe(2025);
  });

  it('should step back a year when the day does not exist in the anchor year', () => {
    expect(inferYear(2, 29, { referenceDate: '2025-03-01' })).toBe(2024);
  });
});

describe('toIsoDate', () => {
  it('should pad month and day', () => {
    expect(toIsoDate(2025, 6, 3)).toBe('2025-06-03');
  });

  it('should reject days past the end of the month', () => {
    expect(toIsoDate(2025, 2, 29)).toBeNull();
    expect(toIsoDate(2024, 2, 29)).toBe('2024-02-29');
  });
});

describe('isWithinPeriod', () => {
  it('should include both period bounds', () => {
    const period = { start: '2025-06-01', end: '2025-06-30' };
    expect(isWithinPeriod('2025-06-01', period)).toBe(true);
    expect(isWithinPeriod('2025-06-30', period)).toBe(true);
    expect(isWithinPeriod('2025-07-01', period)).toBe(false);
  });

  it('should accept any date without a period', () => {
    expect(isWithinPeriod('1999-01-01')).toBe(true);
  });
});
