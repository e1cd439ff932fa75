import { z } from 'zod';
import { IngestOptions } from '../services/IngestionService.js';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date');

const StatementOptionsSchema = z
  .object({
    periodStart: isoDate.optional(),
    periodEnd: isoDate.optional(),
    referenceDate: isoDate.optional(),
  })
  .refine((value) => (value.periodStart === undefined) === (value.periodEnd === undefined), {
    message: 'periodStart and periodEnd must be provided together',
  })
  .refine((value) => !value.periodStart || !value.periodEnd || value.periodStart <= value.periodEnd, {
    message: 'periodStart must not be after periodEnd',
  });

export const StatementTextRequestSchema = StatementOptionsSchema.and(
  z.object({
    text: z.string(),
  }),
);

export type StatementOptionsDTO = z.infer<typeof StatementOptionsSchema>;

export const parseStatementOptions = (body: unknown): IngestOptions => {
  const options = StatementOptionsSchema.parse(body ?? {});
  return toIngestOptions(options);
};

export const toIngestOptions = (options: StatementOptionsDTO): IngestOptions => ({
  period: options.periodStart && options.periodEnd ? { start: options.periodStart, end: options.periodEnd } : undefined,
  referenceDate: options.referenceDate,
});
