import { StatementMetadata } from '../../domain/entities/Statement.js';
import { CategorizedTransaction } from '../../domain/entities/Transaction.js';
import { ExtractionDiagnostics, ExtractionOutcome } from './ExtractionResultDTO.js';
import { StatementInsightsDTO } from './StatementInsightsDTO.js';

export type IngestionOutcome = ExtractionOutcome | 'Tabular';

export interface IngestionResultDTO {
  metadata: StatementMetadata;
  transactions: CategorizedTransaction[];
  extraction: {
    outcome: IngestionOutcome;
    reason?: string;
    diagnostics?: ExtractionDiagnostics;
  };
  categoryCounts: Record<string, number>;
  insights: StatementInsightsDTO;
}
