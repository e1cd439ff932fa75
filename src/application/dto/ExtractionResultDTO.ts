import { TransactionRecord } from '../../domain/entities/Transaction.js';
import { ExtractionUnavailable, ValidationRejectedReason } from '../../domain/errors.js';

export interface ExtractionDiagnostics {
  chunks: number;
  failedChunks: number;
  candidates: number;
  rejected: number;
  rejectionReasons: Partial<Record<ValidationRejectedReason, number>>;
}

export const emptyDiagnostics = (): ExtractionDiagnostics => ({
  chunks: 0,
  failedChunks: 0,
  candidates: 0,
  rejected: 0,
  rejectionReasons: {},
});

export type ModelExtractionResult =
  | { ok: true; records: TransactionRecord[]; diagnostics: ExtractionDiagnostics }
  | { ok: false; error: ExtractionUnavailable; diagnostics: ExtractionDiagnostics };

export type ExtractionResult =
  | { kind: 'Accepted'; records: TransactionRecord[]; diagnostics: ExtractionDiagnostics }
  | { kind: 'FallenBack'; records: TransactionRecord[]; reason: string; diagnostics?: ExtractionDiagnostics }
  | { kind: 'InputExhausted'; records: []; reason?: string };

export type ExtractionOutcome = ExtractionResult['kind'];
