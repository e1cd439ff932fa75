import { isBlankDocument, StatementDocument } from '../../domain/entities/Statement.js';
import { TransactionRecord } from '../../domain/entities/Transaction.js';
import { retag, sortByDate } from '../../domain/services/TransactionPromoter.js';
import { ExtractionDiagnostics, ExtractionResult, ModelExtractionResult } from '../dto/ExtractionResultDTO.js';
import { LoggerPort } from '../ports/LoggerPort.js';
import { ExtractionContext, ModelExtractorPort, PatternExtractorPort } from '../ports/TransactionExtractorPort.js';

type ExtractionState =
  | { name: 'TryModel' }
  | { name: 'Validate'; outcome: ModelExtractionResult }
  | { name: 'Accept'; records: TransactionRecord[]; diagnostics: ExtractionDiagnostics }
  | { name: 'FallbackToPattern'; reason: string; diagnostics?: ExtractionDiagnostics }
  | { name: 'Done'; result: ExtractionResult };

/**
 * Model first, pattern extractor second:
 * TryModel -> Validate -> (Accept | FallbackToPattern) -> Done.
 *
 * Never throws for extraction failure. Why the model path was abandoned is carried by
 * the `FallenBack` (or `InputExhausted`) result.
 */
export class ExtractionOrchestrator {
  constructor(
    private readonly patternExtractor: PatternExtractorPort,
    private readonly modelExtractor: ModelExtractorPort | null,
    private readonly logger: LoggerPort,
  ) {}

  async extract(document: StatementDocument, context: ExtractionContext): Promise<ExtractionResult> {
    if (isBlankDocument(document)) {
      this.logger.info('Statement text is empty; nothing to extract');
      return { kind: 'InputExhausted', records: [] };
    }

    let state: ExtractionState = { name: 'TryModel' };

    while (state.name !== 'Done') {
      state = await this.step(state, document, context);
    }

    const { result } = state;
    this.logger.info('Extraction finished', {
      outcome: result.kind,
      records: result.records.length,
      reason: result.kind === 'Accepted' ? undefined : result.reason,
    });

    return result;
  }

  private async step(
    state: Exclude<ExtractionState, { name: 'Done' }>,
    document: StatementDocument,
    context: ExtractionContext,
  ): Promise<ExtractionState> {
    switch (state.name) {
      case 'TryModel': {
        if (!this.modelExtractor) {
          return { name: 'FallbackToPattern', reason: 'model extraction disabled' };
        }

        try {
          return { name: 'Validate', outcome: await this.modelExtractor.extract(document, context) };
        } catch (error) {
          // A misbehaving extractor is treated like an unavailable one.
          const message = error instanceof Error ? error.message : 'Unknown error';
          this.logger.error('Model extractor threw', error);
          return { name: 'FallbackToPattern', reason: `model extractor error: ${message}` };
        }
      }

      case 'Validate': {
        const { outcome } = state;
        if (!outcome.ok) {
          return {
            name: 'FallbackToPattern',
            reason: `${outcome.error.reason}: ${outcome.error.message}`,
            diagnostics: outcome.diagnostics,
          };
        }

        if (outcome.records.length === 0) {
          return { name: 'FallbackToPattern', reason: 'model returned no records', diagnostics: outcome.diagnostics };
        }

        return { name: 'Accept', records: outcome.records, diagnostics: outcome.diagnostics };
      }

      case 'Accept':
        return {
          name: 'Done',
          result: { kind: 'Accepted', records: sortByDate(retag(state.records, 'model')), diagnostics: state.diagnostics },
        };

      case 'FallbackToPattern': {
        this.logger.warn('⚠️ Falling back to pattern extraction', { reason: state.reason });
        const records = sortByDate(retag(this.patternExtractor.extract(document, context), 'pattern'));

        if (records.length === 0) {
          return { name: 'Done', result: { kind: 'InputExhausted', records: [], reason: state.reason } };
        }

        return {
          name: 'Done',
          result: { kind: 'FallenBack', records, reason: state.reason, diagnostics: state.diagnostics },
        };
      }
    }
  }
}
