import { CategoryAssignment } from '../../domain/entities/Transaction.js';

export interface RuleCategorizerPort {
  /** `null` means no rule matched. */
  categorize(description: string, amount: number): CategoryAssignment | null;
}

export interface ModelCategorizerPort {
  /** Rejects with CategorizationUnavailable. */
  categorize(description: string, amount: number): Promise<CategoryAssignment>;
}
