import { StatementDocument } from '../../../domain/entities/Statement.js';
import { TransactionRecord } from '../../../domain/entities/Transaction.js';
import { AMOUNT_TOKEN, parseAmount } from '../../../domain/services/AmountParser.js';
import { DATE_TOKEN } from '../../../domain/services/DateNormalizer.js';
import { collapseWhitespace } from '../../../domain/services/DescriptionNormalizer.js';
import { promoteCandidate, sortByDate } from '../../../domain/services/TransactionPromoter.js';
import { LoggerPort } from '../../../application/ports/LoggerPort.js';
import { ExtractionContext, PatternExtractorPort } from '../../../application/ports/TransactionExtractorPort.js';

type Section = 'debit' | 'credit' | null;

interface DraftEntry {
  date: string;
  descriptionParts: string[];
  amount?: string;
  section: Section;
}

const dateLed = new RegExp(`^(${DATE_TOKEN})(?:\\s+(.*))?$`, 'i');
const trailingAmounts = new RegExp(`^(.*?)(?:^|\\s+)(${AMOUNT_TOKEN})(?:\\s+(${AMOUNT_TOKEN}))?$`, 'i');

const strongDebitWords = new Set(['withdrawals', 'debits', 'checks', 'fees', 'charges', 'purchases', 'subtractions']);
const strongCreditWords = new Set(['deposits', 'credits', 'additions']);
const weakDebitWords = new Set(['payments']);
const generalWords = new Set(['transactions', 'activity']);
const fillerWords = new Set([
  'and',
  'other',
  'electronic',
  'atm',
  'debit',
  'card',
  'cards',
  'paid',
  'service',
  'online',
  'continued',
  'account',
  'your',
  'posted',
  'date',
  'description',
  'amount',
]);

const noisePatterns: RegExp[] = [
  /\b(?:beginning|ending|opening|closing|daily|previous|new|available|statement)\s+balance\b/i,
  /^balance\b/i,
  /^(?:sub)?total\b/i,
  /\btotal\s+(?:deposits|withdrawals|debits|credits|checks|fees|additions|subtractions)\b/i,
  /^page\s+\d+/i,
  /\bpage\s+\d+\s+of\s+\d+\b/i,
  /^date\s+(?:posted\s+)?description\b/i,
  /\bstatement\s+period\b/i,
  /\baccount\s+(?:number|summary)\b/i,
];

/**
 * Returns the section sign a header line announces, `null` for a header that does not
 * fix a sign, or `undefined` when the line is not a section header.
 */
export const detectSection = (line: string): Section | undefined => {
  const words = line.toLowerCase().split(/[^a-z]+/).filter(Boolean);
  if (words.length === 0) return undefined;

  let debit = false;
  let credit = false;
  let weakDebit = false;
  let general = false;

  for (const word of words) {
    if (strongDebitWords.has(word)) debit = true;
    else if (strongCreditWords.has(word)) credit = true;
    else if (weakDebitWords.has(word)) weakDebit = true;
    else if (generalWords.has(word)) general = true;
    else if (!fillerWords.has(word)) return undefined;
  }

  if (/\d/.test(line.replace(/\(\d+\)/g, ''))) return undefined;

  if (debit && credit) return null;
  if (debit) return 'debit';
  if (credit) return 'credit';
  if (weakDebit) return 'debit';
  return general ? null : undefined;
};

const isNoise = (line: string): boolean => noisePatterns.some((pattern) => pattern.test(line));

const splitTrailingAmount = (text: string): { text: string; amount?: string } => {
  const match = text.match(trailingAmounts);
  if (!match) return { text };
  return { text: match[1].trim(), amount: match[2] };
};

const signedAmount = (raw: string, section: Section): number | null => {
  const parsed = parseAmount(raw);
  if (parsed === null) return null;
  if (section === 'debit') return -Math.abs(parsed);
  if (section === 'credit') return Math.abs(parsed);
  return parsed;
};

/**
 * Line-oriented statement reader. Recognizes `date description amount [balance]` lines,
 * section headers that fix the sign of the lines below them, and description lines
 * that wrap onto the next line. Output is sorted by date and tagged `pattern`.
 */
export class PatternTransactionExtractor implements PatternExtractorPort {
  constructor(private readonly logger: LoggerPort) {}

  extract(document: StatementDocument, context: ExtractionContext): TransactionRecord[] {
    const drafts = this.collectDrafts(document);
    const records: TransactionRecord[] = [];
    let incomplete = 0;
    let rejected = 0;

    for (const draft of drafts) {
      if (draft.amount === undefined) {
        incomplete++;
        continue;
      }

      const amount = signedAmount(draft.amount, draft.section);
      if (amount === null) {
        rejected++;
        continue;
      }

      const promotion = promoteCandidate(
        { date: draft.date, amount, description: draft.descriptionParts.join(' ') },
        'pattern',
        context,
      );

      if (promotion.ok) {
        records.push(promotion.record);
      } else {
        rejected++;
      }
    }

    this.logger.debug('Pattern extraction finished', {
      entries: drafts.length,
      extracted: records.length,
      incomplete,
      rejected,
    });

    return sortByDate(records);
  }

  private collectDrafts(document: StatementDocument): DraftEntry[] {
    const drafts: DraftEntry[] = [];
    let section: Section = null;

    for (const page of document.pages) {
      // Wrapped descriptions do not continue across a page break.
      let current: DraftEntry | null = null;

      for (const rawLine of page.text.split(/\r?\n/)) {
        const line = collapseWhitespace(rawLine);

        if (!line) {
          current = null;
          continue;
        }

        const header = detectSection(line);
        if (header !== undefined) {
          section = header;
          current = null;
          continue;
        }

        if (isNoise(line)) {
          current = null;
          continue;
        }

        const dated = line.match(dateLed);
        if (dated) {
          const { text, amount } = splitTrailingAmount(dated[2] ?? '');
          current = { date: dated[1], descriptionParts: text ? [text] : [], amount, section };
          drafts.push(current);
          continue;
        }

        if (!current) continue;

        const { text, amount } = splitTrailingAmount(line);
        if (amount === undefined) {
          current.descriptionParts.push(line);
        } else if (current.amount === undefined) {
          if (text) current.descriptionParts.push(text);
          current.amount = amount;
        } else {
          // An amount line with no date of its own is a summary figure, not a wrap.
          current = null;
        }
      }
    }

    return drafts;
  }
}
