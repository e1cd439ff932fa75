import { ExtractionSource, TransactionRecord } from '../entities/Transaction.js';
import { ValidationRejected } from '../errors.js';
import { DateContext, isWithinPeriod, normalizeDate } from './DateNormalizer.js';
import { parseAmount } from './AmountParser.js';
import { collapseWhitespace } from './DescriptionNormalizer.js';

export interface TransactionCandidate {
  date: string;
  amount: string | number;
  description: string;
}

export type PromotionResult =
  | { ok: true; record: TransactionRecord }
  | { ok: false; rejection: ValidationRejected };

const reject = (rejection: ValidationRejected): PromotionResult => ({ ok: false, rejection });

/** Turns a loosely typed candidate into a canonical record, or says why it cannot be one. */
export const promoteCandidate = (
  candidate: TransactionCandidate,
  source: ExtractionSource,
  context: DateContext,
): PromotionResult => {
  const description = collapseWhitespace(candidate.description);
  if (!description) {
    return reject(new ValidationRejected('empty_description', 'Description is empty'));
  }

  const date = normalizeDate(candidate.date, context);
  if (!date) {
    return reject(new ValidationRejected('invalid_date', `Unparseable date: ${candidate.date}`));
  }

  if (!isWithinPeriod(date, context.period)) {
    return reject(new ValidationRejected('outside_period', `Date ${date} is outside the statement period`));
  }

  const amount = parseAmount(candidate.amount);
  if (amount === null) {
    return reject(new ValidationRejected('invalid_amount', `Unparseable amount: ${String(candidate.amount)}`));
  }

  if (amount === 0) {
    return reject(new ValidationRejected('zero_amount', 'Zero amount'));
  }

  return { ok: true, record: { date, amount, description, sourceConfidence: source } };
};

/** Oldest first; records sharing a date keep their incoming order. */
export const sortByDate = <T extends { date: string }>(records: readonly T[]): T[] =>
  records
    .map((record, index) => ({ record, index }))
    .sort((a, b) => a.record.date.localeCompare(b.record.date) || a.index - b.index)
    .map(({ record }) => record);

export const retag = (records: readonly TransactionRecord[], source: ExtractionSource): TransactionRecord[] =>
  records.map((record) => (record.sourceConfidence === source ? record : { ...record, sourceConfidence: source }));
