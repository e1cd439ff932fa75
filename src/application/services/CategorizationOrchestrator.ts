import { OTHER_CATEGORY } from '../../domain/entities/Category.js';
import { CategorizedTransaction, TransactionRecord } from '../../domain/entities/Transaction.js';
import { describeError } from '../../domain/errors.js';
import { ModelCategorizerPort, RuleCategorizerPort } from '../ports/CategorizerPort.js';
import { LoggerPort } from '../ports/LoggerPort.js';
import { mapWithConcurrency } from './WorkerPool.js';

export interface CategorizationOptions {
  concurrency: number;
}

/**
 * Rules first, then the model, then `Other`. Each record is decided on its own, so the
 * batch fans out over a bounded pool and is put back in input order by index.
 */
export class CategorizationOrchestrator {
  constructor(
    private readonly ruleCategorizer: RuleCategorizerPort,
    private readonly modelCategorizer: ModelCategorizerPort | null,
    private readonly options: CategorizationOptions,
    private readonly logger: LoggerPort,
  ) {}

  async categorize(records: readonly TransactionRecord[]): Promise<CategorizedTransaction[]> {
    const categorized = await mapWithConcurrency(records, this.options.concurrency, (record) =>
      this.categorizeOne(record),
    );

    const bySource = { rule: 0, model: 0, fallback: 0 };
    categorized.forEach((record) => (bySource[record.categorySource] += 1));
    this.logger.info('Categorization finished', { records: categorized.length, ...bySource });

    return categorized;
  }

  async categorizeOne(record: TransactionRecord): Promise<CategorizedTransaction> {
    const ruleMatch = this.ruleCategorizer.categorize(record.description, record.amount);
    if (ruleMatch) {
      return { ...record, ...ruleMatch, categorySource: 'rule' };
    }

    if (this.modelCategorizer) {
      try {
        const modelMatch = await this.modelCategorizer.categorize(record.description, record.amount);
        return { ...record, ...modelMatch, categorySource: 'model' };
      } catch (error) {
        this.logger.warn('Model categorization unavailable, using Other', {
          description: record.description,
          error: describeError(error),
        });
      }
    }

    return { ...record, category: OTHER_CATEGORY, subcategory: null, categorySource: 'fallback' };
  }
}
