export type ExtractionUnavailableReason = 'unreachable' | 'malformed_output' | 'no_valid_records';

export class ExtractionUnavailable extends Error {
  readonly name = 'ExtractionUnavailable';

  constructor(
    readonly reason: ExtractionUnavailableReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export type CategorizationUnavailableReason = 'unreachable' | 'invalid_category' | 'malformed_output';

export class CategorizationUnavailable extends Error {
  readonly name = 'CategorizationUnavailable';

  constructor(
    readonly reason: CategorizationUnavailableReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export type ValidationRejectedReason =
  | 'invalid_shape'
  | 'invalid_date'
  | 'outside_period'
  | 'invalid_amount'
  | 'zero_amount'
  | 'empty_description';

export class ValidationRejected extends Error {
  readonly name = 'ValidationRejected';

  constructor(
    readonly reason: ValidationRejectedReason,
    message: string,
  ) {
    super(message);
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';
