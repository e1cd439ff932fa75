import { StatementDocument } from '../../domain/entities/Statement.js';
import { TransactionRecord } from '../../domain/entities/Transaction.js';
import { DateContext } from '../../domain/services/DateNormalizer.js';
import { ModelExtractionResult } from '../dto/ExtractionResultDTO.js';

export type ExtractionContext = DateContext;

export interface PatternExtractorPort {
  extract(document: StatementDocument, context: ExtractionContext): TransactionRecord[];
}

export interface ModelExtractorPort {
  extract(document: StatementDocument, context: ExtractionContext): Promise<ModelExtractionResult>;
}
