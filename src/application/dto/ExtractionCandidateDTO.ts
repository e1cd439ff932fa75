import { z } from 'zod';

export const ExtractionCandidateSchema = z.object({
  date: z.string(),
  amount: z.union([z.number(), z.string()]),
  description: z.string(),
});

export type ExtractionCandidateDTO = z.infer<typeof ExtractionCandidateSchema>;

/** Model answers arrive either as a bare array or wrapped in an object. */
export const ExtractionEnvelopeSchema = z.union([
  z.array(z.unknown()),
  z.object({ transactions: z.array(z.unknown()) }).transform((envelope) => envelope.transactions),
]);
