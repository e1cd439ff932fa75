import { StatementDocument } from '../../../domain/entities/Statement.js';
import { TransactionRecord } from '../../../domain/entities/Transaction.js';
import { describeError, ExtractionUnavailable, ValidationRejectedReason } from '../../../domain/errors.js';
import { promoteCandidate } from '../../../domain/services/TransactionPromoter.js';
import { ExtractionCandidateSchema, ExtractionEnvelopeSchema } from '../../../application/dto/ExtractionCandidateDTO.js';
import { emptyDiagnostics, ExtractionDiagnostics, ModelExtractionResult } from '../../../application/dto/ExtractionResultDTO.js';
import { LoggerPort } from '../../../application/ports/LoggerPort.js';
import { StructuredExtractionPort } from '../../../application/ports/StructuredExtractionPort.js';
import { ExtractionContext, ModelExtractorPort } from '../../../application/ports/TransactionExtractorPort.js';
import { mapWithConcurrency } from '../../../application/services/WorkerPool.js';
import { callWithTimeout, retryWithBackoff } from '../../http/ResilientCall.js';

export const TRANSACTION_SCHEMA_DESCRIPTION = `Extract every transaction from the bank statement text. Return ONLY a JSON array, no explanation.

Format: [{"date":"YYYY-MM-DD","description":"text","amount":-45.67}]

Rules:
- Entries under "Withdrawals", "Debits", "Checks", "Fees" or "Purchases" get a NEGATIVE amount
- Entries under "Deposits", "Credits" or "Additions" get a POSITIVE amount
- If a date has no year, write it exactly as printed (for example "06/12")
- Keep the merchant name and location exactly as printed; join wrapped lines with a space
- Skip balances, totals, headers and account summaries
- Return [] if there are no transactions`;

export interface ModelTransactionExtractorOptions {
  maxChunkChars: number;
  timeoutMs: number;
  /** Extra attempts per chunk after the first. */
  retries: number;
  backoffMs: number;
  concurrency: number;
}

export class MalformedModelOutput extends Error {
  readonly name = 'MalformedModelOutput';
}

type ChunkOutcome = { ok: true; candidates: unknown[] } | { ok: false; error: unknown };

const tryParseJson = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
};

/**
 * Best-effort read of a model answer: code fences and surrounding prose are tolerated
 * as long as a JSON array (or an object with a `transactions` array) can be found.
 */
export const parseCandidateList = (raw: string): unknown[] => {
  const cleaned = raw
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/i, '');

  const snippets = [
    cleaned,
    cleaned.match(/\[[\s\S]*\]/)?.[0],
    cleaned.match(/\[\s*(?:\{[\s\S]*\})?\s*\]/)?.[0],
    cleaned.match(/\{[\s\S]*\}/)?.[0],
  ];

  for (const snippet of snippets) {
    if (snippet === undefined) continue;

    const envelope = ExtractionEnvelopeSchema.safeParse(tryParseJson(snippet));
    if (envelope.success) {
      return envelope.data;
    }
  }

  throw new MalformedModelOutput('No JSON transaction list found in model output');
};

const splitOversized = (text: string, maxChars: number): string[] => {
  const sections = text.split(/\n\s*\n/).filter((section) => section.trim() !== '');
  const pieces: string[] = [];

  for (const section of sections) {
    if (section.length <= maxChars) {
      pieces.push(section);
      continue;
    }

    // Still too large: pack whole lines. A single line longer than the limit stays whole.
    let current = '';
    for (const line of section.split('\n')) {
      if (current && current.length + 1 + line.length > maxChars) {
        pieces.push(current);
        current = '';
      }
      current = current ? `${current}\n${line}` : line;
    }
    if (current.trim()) pieces.push(current);
  }

  return pieces;
};

/**
 * Splits a document into pieces of at most `maxChars`, cutting only between pages,
 * then between blank-line separated sections, then between lines. Order is preserved.
 */
export const splitIntoChunks = (document: StatementDocument, maxChars: number): string[] => {
  const units = document.pages.flatMap((page) => {
    if (page.text.trim() === '') return [];
    return page.text.length <= maxChars ? [page.text] : splitOversized(page.text, maxChars);
  });

  const chunks: string[] = [];
  let current = '';

  for (const unit of units) {
    if (current && current.length + 1 + unit.length > maxChars) {
      chunks.push(current);
      current = '';
    }
    current = current ? `${current}\n${unit}` : unit;
  }

  if (current) chunks.push(current);
  return chunks;
};

const countRejection = (diagnostics: ExtractionDiagnostics, reason: ValidationRejectedReason): void => {
  diagnostics.rejected += 1;
  diagnostics.rejectionReasons[reason] = (diagnostics.rejectionReasons[reason] ?? 0) + 1;
};

export class ModelTransactionExtractor implements ModelExtractorPort {
  constructor(
    private readonly capability: StructuredExtractionPort,
    private readonly options: ModelTransactionExtractorOptions,
    private readonly logger: LoggerPort,
  ) {}

  async extract(document: StatementDocument, context: ExtractionContext): Promise<ModelExtractionResult> {
    const diagnostics = emptyDiagnostics();
    const chunks = splitIntoChunks(document, this.options.maxChunkChars);
    diagnostics.chunks = chunks.length;

    if (chunks.length === 0) {
      return {
        ok: false,
        error: new ExtractionUnavailable('no_valid_records', 'Document has no text to extract from'),
        diagnostics,
      };
    }

    this.logger.info('Model extraction started', {
      chunks: chunks.length,
      characters: chunks.reduce((total, chunk) => total + chunk.length, 0),
    });

    const outcomes = await mapWithConcurrency(chunks, this.options.concurrency, (chunk, index) =>
      this.extractChunk(chunk, index),
    );

    const records: TransactionRecord[] = [];
    const failures: unknown[] = [];

    for (const outcome of outcomes) {
      if (!outcome.ok) {
        diagnostics.failedChunks += 1;
        failures.push(outcome.error);
        continue;
      }

      for (const raw of outcome.candidates) {
        diagnostics.candidates += 1;

        const candidate = ExtractionCandidateSchema.safeParse(raw);
        if (!candidate.success) {
          countRejection(diagnostics, 'invalid_shape');
          continue;
        }

        const promotion = promoteCandidate(candidate.data, 'model', context);
        if (promotion.ok) {
          records.push(promotion.record);
        } else {
          countRejection(diagnostics, promotion.rejection.reason);
        }
      }
    }

    this.logger.info('Model extraction finished', { ...diagnostics, accepted: records.length });

    if (failures.length === chunks.length) {
      const malformed = failures.every((failure) => failure instanceof MalformedModelOutput);
      return {
        ok: false,
        error: new ExtractionUnavailable(
          malformed ? 'malformed_output' : 'unreachable',
          `All ${chunks.length} chunk(s) failed: ${describeError(failures[failures.length - 1])}`,
          { cause: failures[failures.length - 1] },
        ),
        diagnostics,
      };
    }

    if (records.length === 0) {
      return {
        ok: false,
        error: new ExtractionUnavailable(
          'no_valid_records',
          `No valid transactions among ${diagnostics.candidates} candidate(s)`,
        ),
        diagnostics,
      };
    }

    return { ok: true, records, diagnostics };
  }

  private async extractChunk(chunk: string, index: number): Promise<ChunkOutcome> {
    try {
      const candidates = await retryWithBackoff(
        async () => {
          const raw = await callWithTimeout(
            (signal) =>
              this.capability.extract(
                { documentText: chunk, schemaDescription: TRANSACTION_SCHEMA_DESCRIPTION },
                { signal },
              ),
            this.options.timeoutMs,
          );
          return parseCandidateList(raw);
        },
        {
          retries: this.options.retries,
          backoffMs: this.options.backoffMs,
          onRetry: (error, attempt) =>
            this.logger.warn('Retrying chunk extraction', { chunk: index, attempt, error: describeError(error) }),
        },
      );

      return { ok: true, candidates };
    } catch (error) {
      this.logger.warn('Chunk extraction abandoned', { chunk: index, error: describeError(error) });
      return { ok: false, error };
    }
  }
}
