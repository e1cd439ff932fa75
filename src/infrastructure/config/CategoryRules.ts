import { readFileSync } from 'node:fs';
import { CategoryRuleSetDTO, CategoryRuleSetSchema } from '../../application/dto/CategoryRulesDTO.js';

export const loadCategoryRules = (filePath: string): CategoryRuleSetDTO => {
  const raw = readFileSync(filePath, 'utf8');
  return CategoryRuleSetSchema.parse(JSON.parse(raw));
};
