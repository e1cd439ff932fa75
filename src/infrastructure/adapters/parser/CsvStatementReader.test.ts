import { describe, expect, it } from 'vitest';
import { CsvColumnsMissing, CsvStatementReader } from './CsvStatementReader.js';

const reader = new CsvStatementReader();
const june2025 = { period: { start: '2025-06-01', end: '2025-06-30' }, referenceDate: '2025-07-02' };

describe('CsvStatementReader', () => {
  it('should read a signed amount column and sort by date', () => {
    const csv = [
      'Date,Description,Amount',
      '06/12/2025,TARGET T-9801,-50.93',
      '06/01/2025,PAYROLL ACME,"2,500.00"',
      '06/15/2025,,-5.00',
    ].join('\n');

    expect(reader.read(csv, june2025)).toEqual({
      records: [
        { date: '2025-06-01', amount: 2500, description: 'PAYROLL ACME', sourceConfidence: 'pattern' },
        { date: '2025-06-12', amount: -50.93, description: 'TARGET T-9801', sourceConfidence: 'pattern' },
      ],
      rejected: 1,
    });
  });

  it('should sign split debit and credit columns', () => {
    const csv = '\uFEFFPosted Date,Payee,Money Out,Money In\n2025-06-03,SHELL OIL,45.10,\n2025-06-04,REFUND,,12.00\n';

    const { records } = reader.read(csv, { referenceDate: '2025-07-01' });

    expect(records.map(({ description, amount }) => [description, amount])).toEqual([
      ['SHELL OIL', -45.1],
      ['REFUND', 12],
    ]);
  });

  it('should refuse files without the required columns', () => {
    expect(() => reader.read('Foo,Bar\n1,2', june2025)).toThrow(CsvColumnsMissing);
  });

  it('should return nothing for an empty file', () => {
    expect(reader.read('', june2025)).toEqual({ records: [], rejected: 0 });
  });
});
