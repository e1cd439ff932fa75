import { Category } from '../../../domain/entities/Category.js';
import { CategoryAssignment } from '../../../domain/entities/Transaction.js';
import { toTokenText } from '../../../domain/services/DescriptionNormalizer.js';
import { CategoryRuleSetDTO } from '../../../application/dto/CategoryRulesDTO.js';
import { RuleCategorizerPort } from '../../../application/ports/CategorizerPort.js';

interface CompiledRule {
  category: Category;
  requiresPositiveAmount: boolean;
  keywords: string[];
  subcategories: Array<{ name: string; keywords: string[] }>;
}

const matchesAny = (haystack: string, tokens: string[]): boolean => tokens.some((token) => haystack.includes(token));

export class RuleBasedCategorizer implements RuleCategorizerPort {
  private readonly rules: CompiledRule[];

  constructor(ruleSet: CategoryRuleSetDTO) {
    this.rules = ruleSet.rules.map((rule) => ({
      category: rule.category,
      requiresPositiveAmount: rule.requiresPositiveAmount,
      keywords: rule.keywords.map(toTokenText),
      subcategories: rule.subcategories.map((subcategory) => ({
        name: subcategory.name,
        keywords: subcategory.keywords.map(toTokenText),
      })),
    }));
  }

  categorize(description: string, amount: number): CategoryAssignment | null {
    const haystack = toTokenText(description);

    for (const rule of this.rules) {
      // Sign alone never makes income; it only gates the income keywords.
      if (rule.requiresPositiveAmount && amount <= 0) continue;
      if (!matchesAny(haystack, rule.keywords)) continue;

      const subcategory = rule.subcategories.find((candidate) => matchesAny(haystack, candidate.keywords));
      return { category: rule.category, subcategory: subcategory?.name ?? null };
    }

    return null;
  }
}
