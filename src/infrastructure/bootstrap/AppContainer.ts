import OpenAI from 'openai';
import { CategorizationOrchestrator } from '../../application/services/CategorizationOrchestrator.js';
import { ExtractionOrchestrator } from '../../application/services/ExtractionOrchestrator.js';
import { IngestionService } from '../../application/services/IngestionService.js';
import { InsightsService } from '../../application/services/InsightsService.js';
import { ClassificationPort } from '../../application/ports/ClassificationPort.js';
import { CsvReaderPort } from '../../application/ports/CsvReaderPort.js';
import { MetadataExtractorPort } from '../../application/ports/MetadataExtractorPort.js';
import { StructuredExtractionPort } from '../../application/ports/StructuredExtractionPort.js';
import { TextSourcePort } from '../../application/ports/TextSourcePort.js';
import { RuleBasedCategorizer } from '../adapters/categorizer/RuleBasedCategorizer.js';
import { ModelCategorizer } from '../adapters/categorizer/ModelCategorizer.js';
import { OpenAIClassification } from '../adapters/llm/OpenAIClassification.js';
import { OpenAIStructuredExtraction } from '../adapters/llm/OpenAIStructuredExtraction.js';
import { CsvStatementReader } from '../adapters/parser/CsvStatementReader.js';
import { ModelTransactionExtractor } from '../adapters/parser/ModelTransactionExtractor.js';
import { PatternTransactionExtractor } from '../adapters/parser/PatternTransactionExtractor.js';
import { PdfTextSource } from '../adapters/parser/PdfTextSource.js';
import { StatementMetadataExtractor } from '../adapters/parser/StatementMetadataExtractor.js';
import { AppConfig, loadConfig } from '../config/Config.js';
import { loadCategoryRules } from '../config/CategoryRules.js';
import { ConsoleLogger } from '../logging/ConsoleLogger.js';

export interface AppContainerOverrides {
  config?: AppConfig;
  logger?: ConsoleLogger;
  textSource?: TextSourcePort;
  metadataExtractor?: MetadataExtractorPort;
  csvReader?: CsvReaderPort;
  /** `null` disables model-assisted extraction even when an API key is configured. */
  structuredExtraction?: StructuredExtractionPort | null;
  /** `null` disables model-assisted categorization even when an API key is configured. */
  classification?: ClassificationPort | null;
  clock?: () => Date;
}

export class AppContainer {
  readonly config: AppConfig;
  readonly logger: ConsoleLogger;

  readonly extractionOrchestrator: ExtractionOrchestrator;
  readonly categorizationOrchestrator: CategorizationOrchestrator;
  readonly insightsService: InsightsService;
  readonly ingestionService: IngestionService;

  constructor(overrides: AppContainerOverrides = {}) {
    this.config = overrides.config ?? loadConfig();
    this.logger = overrides.logger ?? new ConsoleLogger(this.config.app.logLevel);

    const { llm } = this.config;
    const openAIClient = llm.enabled
      ? new OpenAI({
          apiKey: llm.apiKey,
          baseURL: llm.baseUrl,
          timeout: llm.timeoutMs,
          maxRetries: 0, // retries are handled per chunk / per record
        })
      : null;

    const structuredExtraction =
      overrides.structuredExtraction !== undefined
        ? overrides.structuredExtraction
        : openAIClient && new OpenAIStructuredExtraction(openAIClient, { model: llm.extractionModel, maxTokens: llm.maxTokens });

    const classification =
      overrides.classification !== undefined
        ? overrides.classification
        : openAIClient && new OpenAIClassification(openAIClient, { model: llm.classificationModel });

    const extractionLogger = this.logger.child({ component: 'extraction' });
    const categorizationLogger = this.logger.child({ component: 'categorization' });

    const modelExtractor = structuredExtraction
      ? new ModelTransactionExtractor(
          structuredExtraction,
          {
            maxChunkChars: this.config.extraction.maxChunkChars,
            timeoutMs: llm.timeoutMs,
            retries: this.config.extraction.retries,
            backoffMs: this.config.extraction.backoffMs,
            concurrency: this.config.extraction.concurrency,
          },
          extractionLogger,
        )
      : null;

    this.extractionOrchestrator = new ExtractionOrchestrator(
      new PatternTransactionExtractor(extractionLogger),
      modelExtractor,
      extractionLogger,
    );

    const modelCategorizer = classification
      ? new ModelCategorizer(
          classification,
          {
            timeoutMs: llm.timeoutMs,
            retries: this.config.categorization.retries,
            backoffMs: this.config.categorization.backoffMs,
          },
          categorizationLogger,
        )
      : null;

    this.categorizationOrchestrator = new CategorizationOrchestrator(
      new RuleBasedCategorizer(loadCategoryRules(this.config.categorization.rulesPath)),
      modelCategorizer,
      { concurrency: this.config.categorization.concurrency },
      categorizationLogger,
    );

    this.insightsService = new InsightsService({ topMerchantLimit: this.config.insights.topMerchantLimit });

    this.ingestionService = new IngestionService(
      overrides.textSource ?? new PdfTextSource(this.logger),
      overrides.metadataExtractor ?? new StatementMetadataExtractor(),
      this.extractionOrchestrator,
      this.categorizationOrchestrator,
      overrides.csvReader ?? new CsvStatementReader(),
      this.insightsService,
      this.logger,
      overrides.clock,
    );
  }

  hasModelSupport(): boolean {
    return this.config.llm.enabled;
  }
}
