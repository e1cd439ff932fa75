import { describe, expect, it, vi } from 'vitest';
import { TransactionRecord } from '../../domain/entities/Transaction.js';
import { CategorizationUnavailable } from '../../domain/errors.js';
import { RuleBasedCategorizer } from '../../infrastructure/adapters/categorizer/RuleBasedCategorizer.js';
import { DEFAULT_CATEGORY_RULES_PATH } from '../../infrastructure/config/Config.js';
import { loadCategoryRules } from '../../infrastructure/config/CategoryRules.js';
import { ConsoleLogger } from '../../infrastructure/logging/ConsoleLogger.js';
import { ModelCategorizerPort, RuleCategorizerPort } from '../ports/CategorizerPort.js';
import { CategorizationOrchestrator } from './CategorizationOrchestrator.js';

const logger = new ConsoleLogger('silent');
const rules = new RuleBasedCategorizer(loadCategoryRules(DEFAULT_CATEGORY_RULES_PATH));
const noRules: RuleCategorizerPort = { categorize: () => null };

const record = (description: string, amount = -10): TransactionRecord => ({
  date: '2025-06-12',
  amount,
  description,
  sourceConfidence: 'pattern',
});

const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

describe('CategorizationOrchestrator', () => {
  it('should prefer rules and not call the model for matched records', async () => {
    const model = { categorize: vi.fn<ModelCategorizerPort['categorize']>() };
    const orchestrator = new CategorizationOrchestrator(rules, model, { concurrency: 2 }, logger);

    const [categorized] = await orchestrator.categorize([record('TARGET T-9801', -50.93)]);

    expect(categorized).toEqual({
      ...record('TARGET T-9801', -50.93),
      category: 'Groceries',
      subcategory: 'Superstore',
      categorySource: 'rule',
    });
    expect(model.categorize).not.toHaveBeenCalled();
  });

  it('should ask the model when no rule matches', async () => {
    const model = { categorize: vi.fn<ModelCategorizerPort['categorize']>() };
    model.categorize.mockResolvedValue({ category: 'Dining', subcategory: 'Coffee' });
    const orchestrator = new CategorizationOrchestrator(rules, model, { concurrency: 2 }, logger);

    const [categorized] = await orchestrator.categorize([record('BLUE BOTTLE 0042')]);

    expect(categorized).toMatchObject({ category: 'Dining', subcategory: 'Coffee', categorySource: 'model' });
    expect(model.categorize).toHaveBeenCalledWith('BLUE BOTTLE 0042', -10);
  });

  it('should always fall back to Other when no rule matches and the model fails', async () => {
    const model: ModelCategorizerPort = {
      categorize: () => Promise.reject(new CategorizationUnavailable('unreachable', 'Classification failed: down')),
    };
    const orchestrator = new CategorizationOrchestrator(rules, model, { concurrency: 2 }, logger);

    const categorized = await orchestrator.categorize([record('MYSTERY VENDOR 42'), record('MYSTERY VENDOR 42')]);

    for (const item of categorized) {
      expect(item).toMatchObject({ category: 'Other', subcategory: null, categorySource: 'fallback' });
    }
  });

  it('should fall back to Other without a model categorizer', async () => {
    const orchestrator = new CategorizationOrchestrator(rules, null, { concurrency: 2 }, logger);

    const [categorized] = await orchestrator.categorize([record('MYSTERY VENDOR 42')]);

    expect(categorized).toMatchObject({ category: 'Other', subcategory: null, categorySource: 'fallback' });
  });

  it('should return records in input order whatever order the calls finish in', async () => {
    const model: ModelCategorizerPort = {
      categorize: async (description) => {
        await delay((Number(description.slice(1)) * 7) % 5);
        return { category: 'Shopping', subcategory: description };
      },
    };
    const orchestrator = new CategorizationOrchestrator(noRules, model, { concurrency: 4 }, logger);
    const input = Array.from({ length: 25 }, (_, index) => record(`R${index}`));

    const categorized = await orchestrator.categorize(input);

    expect(categorized.map((item) => item.description)).toEqual(input.map((item) => item.description));
    expect(categorized.map((item) => item.subcategory)).toEqual(input.map((item) => item.description));
  });

  it('should return an empty batch unchanged', async () => {
    const model = { categorize: vi.fn<ModelCategorizerPort['categorize']>() };
    const orchestrator = new CategorizationOrchestrator(noRules, model, { concurrency: 4 }, logger);

    await expect(orchestrator.categorize([])).resolves.toEqual([]);
    expect(model.categorize).not.toHaveBeenCalled();
  });
});
