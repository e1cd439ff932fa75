import { StatementDocument, StatementMetadata } from '../../domain/entities/Statement.js';

export interface MetadataExtractorPort {
  extract(document: StatementDocument): StatementMetadata;
}
