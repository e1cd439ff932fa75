import { documentText, StatementDocument, StatementMetadata, StatementPeriod } from '../../../domain/entities/Statement.js';
import { parseAmount } from '../../../domain/services/AmountParser.js';
import { monthFromName, toIsoDate } from '../../../domain/services/DateNormalizer.js';
import { MetadataExtractorPort } from '../../../application/ports/MetadataExtractorPort.js';

const institutions: Array<{ pattern: RegExp; name: string }> = [
  { pattern: /\bchase\b/i, name: 'Chase' },
  { pattern: /bank\s+of\s+america/i, name: 'Bank of America' },
  { pattern: /wells\s+fargo/i, name: 'Wells Fargo' },
  { pattern: /\bcitibank\b/i, name: 'Citibank' },
  { pattern: /\bcapital\s+one\b/i, name: 'Capital One' },
  { pattern: /\bu\.?s\.?\s+bank\b/i, name: 'U.S. Bank' },
  { pattern: /\bpnc\b/i, name: 'PNC' },
  { pattern: /\btruist\b/i, name: 'Truist' },
];

const numericFullDate = '\\d{1,2}[\\/\\-]\\d{1,2}[\\/\\-]\\d{2,4}';
const namedFullDate = '[A-Za-z]{3,9}\\.?\\s+\\d{1,2},?\\s+\\d{4}';
const fullDate = `(?:${numericFullDate}|${namedFullDate})`;

const periodRange = new RegExp(`(${fullDate})\\s*(?:to|-|–|through|thru)\\s*(${fullDate})`, 'i');
const balanceAmount = '(\\(?-?\\$?\\s?[\\d,]+\\.\\d{2}\\)?)';
const openingBalance = new RegExp(`(?:opening|beginning|previous)\\s+balance\\b.*?[\\s:]${balanceAmount}`, 'i');
const closingBalance = new RegExp(`(?:closing|ending|new)\\s+balance\\b.*?[\\s:]${balanceAmount}`, 'i');
const accountNumber = /account\s*(?:number|no\.?|#)\s*[:#]?\s*([x*•\d][\dx*•\s-]{3,})/i;

const parseFullDate = (raw: string): string | null => {
  const numeric = raw.match(/^(\d{1,2})[\/\-](\d{1,2})[\/\-](\d{2,4})$/);
  if (numeric) {
    const year = numeric[3].length === 2 ? 2000 + Number(numeric[3]) : Number(numeric[3]);
    return toIsoDate(year, Number(numeric[1]), Number(numeric[2]));
  }

  const named = raw.match(/^([A-Za-z]{3,9})\.?\s+(\d{1,2}),?\s+(\d{4})$/);
  if (named) {
    const month = monthFromName(named[1]);
    return month ? toIsoDate(Number(named[3]), month, Number(named[2])) : null;
  }

  return null;
};

/** Keeps only the last four digits of an account number. */
export const maskAccountNumber = (raw: string): string | undefined => {
  const digits = raw.replace(/\D/g, '');
  return digits.length >= 4 ? `****${digits.slice(-4)}` : undefined;
};

/**
 * Header-level facts of a statement. Every field is optional; a statement with no
 * recognizable header still yields `{}`.
 */
export class StatementMetadataExtractor implements MetadataExtractorPort {
  extract(document: StatementDocument): StatementMetadata {
    const lines = documentText(document)
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter(Boolean);

    const metadata: StatementMetadata = {};

    const bankName = this.extractBankName(lines);
    if (bankName) metadata.bankName = bankName;

    const accountMask = this.extractAccountMask(lines);
    if (accountMask) metadata.accountMask = accountMask;

    const period = this.extractPeriod(lines);
    if (period) metadata.period = period;

    const opening = this.findAmount(lines, openingBalance);
    if (opening !== undefined) metadata.openingBalance = opening;

    const closing = this.findAmount(lines, closingBalance);
    if (closing !== undefined) metadata.closingBalance = closing;

    return metadata;
  }

  private extractBankName(lines: string[]): string | undefined {
    for (const line of lines.slice(0, 40)) {
      const match = institutions.find((institution) => institution.pattern.test(line));
      if (match) return match.name;
    }
    return undefined;
  }

  private extractAccountMask(lines: string[]): string | undefined {
    for (const line of lines) {
      const match = line.match(accountNumber);
      if (match) {
        const mask = maskAccountNumber(match[1]);
        if (mask) return mask;
      }
    }
    return undefined;
  }

  private extractPeriod(lines: string[]): StatementPeriod | undefined {
    for (const line of lines) {
      const range = line.match(periodRange);
      if (!range) continue;

      const start = parseFullDate(range[1].trim());
      const end = parseFullDate(range[2].trim());
      if (start && end && start <= end) {
        return { start, end };
      }
    }
    return undefined;
  }

  private findAmount(lines: string[], pattern: RegExp): number | undefined {
    for (const line of lines) {
      const match = line.match(pattern);
      if (match) {
        const amount = parseAmount(match[1]);
        if (amount !== null) return amount;
      }
    }
    return undefined;
  }
}
