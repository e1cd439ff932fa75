import { z } from 'zod';

export const ClassificationResponseSchema = z.object({
  category: z.string().min(1),
  subcategory: z.string().nullish(),
});

export type ClassificationResponseDTO = z.infer<typeof ClassificationResponseSchema>;

export interface ClassificationRequestDTO {
  description: string;
  amount: number;
  allowedCategories: readonly string[];
}
