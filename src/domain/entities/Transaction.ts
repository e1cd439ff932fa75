import { Category } from './Category.js';

export type ExtractionSource = 'model' | 'pattern';

export type CategorySource = 'rule' | 'model' | 'fallback';

export interface TransactionRecord {
  readonly date: string; // ISO date
  readonly amount: number; // negative = outflow
  readonly description: string;
  readonly sourceConfidence: ExtractionSource;
}

export interface CategoryAssignment {
  category: Category;
  subcategory: string | null;
}

export interface CategorizedTransaction extends TransactionRecord, CategoryAssignment {
  readonly categorySource: CategorySource;
}
