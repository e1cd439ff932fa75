import dayjs from 'dayjs';
import { documentFromText, StatementDocument, StatementMetadata, StatementPeriod } from '../../domain/entities/Statement.js';
import { CategorizedTransaction } from '../../domain/entities/Transaction.js';
import { describeError } from '../../domain/errors.js';
import { IngestionResultDTO } from '../dto/IngestionResultDTO.js';
import { CsvReaderPort } from '../ports/CsvReaderPort.js';
import { LoggerPort } from '../ports/LoggerPort.js';
import { MetadataExtractorPort } from '../ports/MetadataExtractorPort.js';
import { TextSourcePort } from '../ports/TextSourcePort.js';
import { ExtractionContext } from '../ports/TransactionExtractorPort.js';
import { CategorizationOrchestrator } from './CategorizationOrchestrator.js';
import { ExtractionOrchestrator } from './ExtractionOrchestrator.js';
import { InsightsService } from './InsightsService.js';

export interface IngestOptions {
  /** Overrides the period found in the statement header. */
  period?: StatementPeriod;
  /** Anchor for year inference when no period is known. Defaults to today. */
  referenceDate?: string;
}

export const countByCategory = (transactions: readonly CategorizedTransaction[]): Record<string, number> =>
  transactions.reduce<Record<string, number>>((counts, transaction) => {
    counts[transaction.category] = (counts[transaction.category] ?? 0) + 1;
    return counts;
  }, {});

export class IngestionService {
  constructor(
    private readonly textSource: TextSourcePort,
    private readonly metadataExtractor: MetadataExtractorPort,
    private readonly extraction: ExtractionOrchestrator,
    private readonly categorization: CategorizationOrchestrator,
    private readonly csvReader: CsvReaderPort,
    private readonly insights: InsightsService,
    private readonly logger: LoggerPort,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async ingestPdf(rawStatement: Buffer, options: IngestOptions = {}): Promise<IngestionResultDTO> {
    const document = await this.textSource.readPages(rawStatement);
    return this.ingestDocument(document, options);
  }

  async ingestText(text: string, options: IngestOptions = {}): Promise<IngestionResultDTO> {
    return this.ingestDocument(documentFromText(text), options);
  }

  async ingestDocument(document: StatementDocument, options: IngestOptions = {}): Promise<IngestionResultDTO> {
    const metadata = this.readMetadata(document);
    const context = this.buildContext(options.period ?? metadata.period, options.referenceDate);

    const extraction = await this.extraction.extract(document, context);
    const transactions = await this.categorization.categorize(extraction.records);

    return {
      metadata,
      transactions,
      extraction: {
        outcome: extraction.kind,
        reason: extraction.kind === 'Accepted' ? undefined : extraction.reason,
        diagnostics: extraction.kind === 'InputExhausted' ? undefined : extraction.diagnostics,
      },
      categoryCounts: countByCategory(transactions),
      insights: this.insights.summarize(transactions),
    };
  }

  async ingestCsv(csvText: string, options: IngestOptions = {}): Promise<IngestionResultDTO> {
    const context = this.buildContext(options.period, options.referenceDate);
    const { records, rejected } = this.csvReader.read(csvText, context);

    this.logger.info('CSV statement read', { records: records.length, rejected });

    const transactions = await this.categorization.categorize(records);

    return {
      metadata: options.period ? { period: options.period } : {},
      transactions,
      extraction: { outcome: records.length > 0 ? 'Tabular' : 'InputExhausted' },
      categoryCounts: countByCategory(transactions),
      insights: this.insights.summarize(transactions),
    };
  }

  private readMetadata(document: StatementDocument): StatementMetadata {
    try {
      return this.metadataExtractor.extract(document);
    } catch (error) {
      this.logger.warn('Statement metadata could not be read', { error: describeError(error) });
      return {};
    }
  }

  private buildContext(period: StatementPeriod | undefined, referenceDate: string | undefined): ExtractionContext {
    return {
      period,
      referenceDate: referenceDate ?? dayjs(this.clock()).format('YYYY-MM-DD'),
    };
  }
}
