export { CATEGORIES, OTHER_CATEGORY, resolveCategory } from './domain/entities/Category.js';
export type { Category } from './domain/entities/Category.js';
export type {
  CategorizedTransaction,
  CategoryAssignment,
  CategorySource,
  ExtractionSource,
  TransactionRecord,
} from './domain/entities/Transaction.js';
export { documentFromText } from './domain/entities/Statement.js';
export type { PageText, StatementDocument, StatementMetadata, StatementPeriod } from './domain/entities/Statement.js';
export { CategorizationUnavailable, ExtractionUnavailable, ValidationRejected } from './domain/errors.js';
export { normalizeDate } from './domain/services/DateNormalizer.js';
export { parseAmount } from './domain/services/AmountParser.js';

export type { ExtractionDiagnostics, ExtractionResult, ModelExtractionResult } from './application/dto/ExtractionResultDTO.js';
export type { IngestionResultDTO } from './application/dto/IngestionResultDTO.js';
export type {
  CategoryBreakdownDTO,
  MerchantSpendDTO,
  MonthlyTrendDTO,
  RecurringChargeDTO,
  StatementInsightsDTO,
} from './application/dto/StatementInsightsDTO.js';
export type { ClassificationPort } from './application/ports/ClassificationPort.js';
export type { StructuredExtractionPort } from './application/ports/StructuredExtractionPort.js';
export type { TextSourcePort } from './application/ports/TextSourcePort.js';
export type { LoggerPort } from './application/ports/LoggerPort.js';
export { CategorizationOrchestrator } from './application/services/CategorizationOrchestrator.js';
export { ExtractionOrchestrator } from './application/services/ExtractionOrchestrator.js';
export { IngestionService } from './application/services/IngestionService.js';
export type { IngestOptions } from './application/services/IngestionService.js';
export { InsightsService } from './application/services/InsightsService.js';

export { RuleBasedCategorizer } from './infrastructure/adapters/categorizer/RuleBasedCategorizer.js';
export { ModelCategorizer } from './infrastructure/adapters/categorizer/ModelCategorizer.js';
export { PatternTransactionExtractor } from './infrastructure/adapters/parser/PatternTransactionExtractor.js';
export { ModelTransactionExtractor } from './infrastructure/adapters/parser/ModelTransactionExtractor.js';
export { StatementMetadataExtractor } from './infrastructure/adapters/parser/StatementMetadataExtractor.js';
export { CsvStatementReader } from './infrastructure/adapters/parser/CsvStatementReader.js';
export { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
export type { AppContainerOverrides } from './infrastructure/bootstrap/AppContainer.js';
export { loadConfig } from './infrastructure/config/Config.js';
export type { AppConfig } from './infrastructure/config/Config.js';
export { ConsoleLogger } from './infrastructure/logging/ConsoleLogger.js';
