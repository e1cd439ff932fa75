import { TransactionRecord } from '../../domain/entities/Transaction.js';
import { ExtractionContext } from './TransactionExtractorPort.js';

export interface CsvReaderPort {
  read(csvText: string, context: ExtractionContext): { records: TransactionRecord[]; rejected: number };
}
