import { parse as parseCsv } from 'csv-parse/sync';
import { z } from 'zod';
import { TransactionRecord } from '../../../domain/entities/Transaction.js';
import { parseAmount } from '../../../domain/services/AmountParser.js';
import { promoteCandidate, sortByDate } from '../../../domain/services/TransactionPromoter.js';
import { CsvReaderPort } from '../../../application/ports/CsvReaderPort.js';
import { ExtractionContext } from '../../../application/ports/TransactionExtractorPort.js';

const columnCandidates = {
  date: ['date', 'transaction date', 'posted date', 'posting date', 'trans date'],
  description: ['description', 'details', 'memo', 'payee', 'merchant', 'narrative'],
  amount: ['amount', 'transaction amount'],
  debit: ['debit', 'withdrawal', 'withdrawals', 'money out'],
  credit: ['credit', 'deposit', 'deposits', 'money in'],
};

const CsvRowsSchema = z.array(z.record(z.string()));

type ColumnMap = { [K in keyof typeof columnCandidates]: string | null };

const pickKey = (headers: string[], candidates: string[]): string | null => {
  for (const candidate of candidates) {
    const key = headers.find((header) => header.trim().toLowerCase() === candidate);
    if (key !== undefined) return key;
  }
  return null;
};

const resolveColumns = (headers: string[]): ColumnMap => ({
  date: pickKey(headers, columnCandidates.date),
  description: pickKey(headers, columnCandidates.description),
  amount: pickKey(headers, columnCandidates.amount),
  debit: pickKey(headers, columnCandidates.debit),
  credit: pickKey(headers, columnCandidates.credit),
});

const rowAmount = (row: Record<string, string>, columns: ColumnMap): string | number | null => {
  if (columns.amount) {
    return row[columns.amount] ?? null;
  }

  const debit = columns.debit ? parseAmount(row[columns.debit] ?? '') : null;
  const credit = columns.credit ? parseAmount(row[columns.credit] ?? '') : null;

  if (debit) return -Math.abs(debit);
  if (credit) return Math.abs(credit);
  return null;
};

export class CsvColumnsMissing extends Error {
  readonly name = 'CsvColumnsMissing';
}

/**
 * Exported statement CSVs. Needs a date and description column plus either a signed
 * amount column or separate debit/credit columns. Rows go through the same validation
 * as extracted lines and are tagged `pattern`.
 */
export class CsvStatementReader implements CsvReaderPort {
  read(csvText: string, context: ExtractionContext): { records: TransactionRecord[]; rejected: number } {
    const rows = CsvRowsSchema.parse(
      parseCsv(csvText, {
        columns: true,
        skip_empty_lines: true,
        bom: true,
        relax_column_count: true,
        trim: true,
      }),
    );

    if (rows.length === 0) {
      return { records: [], rejected: 0 };
    }

    const columns = resolveColumns(Object.keys(rows[0]));
    if (!columns.date || !columns.description || (!columns.amount && !columns.debit && !columns.credit)) {
      throw new CsvColumnsMissing(
        `CSV statement: required columns not found. date=${columns.date} description=${columns.description} amount=${columns.amount} debit=${columns.debit} credit=${columns.credit}`,
      );
    }

    const records: TransactionRecord[] = [];
    let rejected = 0;

    for (const row of rows) {
      const amount = rowAmount(row, columns);
      const promotion =
        amount === null
          ? null
          : promoteCandidate(
              { date: row[columns.date] ?? '', amount, description: row[columns.description] ?? '' },
              'pattern',
              context,
            );

      if (promotion?.ok) {
        records.push(promotion.record);
      } else {
        rejected++;
      }
    }

    return { records: sortByDate(records), rejected };
  }
}
