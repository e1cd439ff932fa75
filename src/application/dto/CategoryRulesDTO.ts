import { z } from 'zod';
import { CATEGORIES } from '../../domain/entities/Category.js';

const KeywordListSchema = z.array(z.string().min(1)).min(1);

export const CategoryRuleSchema = z.object({
  category: z.enum(CATEGORIES).refine((category): boolean => category !== 'Other', {
    message: 'Other is the fallback category and cannot carry rules',
  }),
  requiresPositiveAmount: z.boolean().default(false),
  keywords: KeywordListSchema,
  subcategories: z
    .array(
      z.object({
        name: z.string().min(1),
        keywords: KeywordListSchema,
      }),
    )
    .default([]),
});

export const CategoryRuleSetSchema = z.object({
  rules: z.array(CategoryRuleSchema),
});

export type CategoryRuleSetDTO = z.infer<typeof CategoryRuleSetSchema>;
