import { describe, expect, it, vi } from 'vitest';
import { CategorizationUnavailable } from '../../../domain/errors.js';
import { ClassificationPort } from '../../../application/ports/ClassificationPort.js';
import { ConsoleLogger } from '../../logging/ConsoleLogger.js';
import { ModelCategorizer } from './ModelCategorizer.js';

const logger = new ConsoleLogger('silent');
const options = { timeoutMs: 1000, retries: 1, backoffMs: 0 };

const capabilityReturning = (...answers: Array<Awaited<ReturnType<ClassificationPort['classify']>> | Error>) => {
  const classify = vi.fn<ClassificationPort['classify']>();
  for (const answer of answers) {
    if (answer instanceof Error) classify.mockRejectedValueOnce(answer);
    else classify.mockResolvedValueOnce(answer);
  }
  return { classify };
};

describe('ModelCategorizer', () => {
  it('should return the canonical category name', async () => {
    const capability = capabilityReturning({ category: 'dining', subcategory: ' Coffee ' });
    const categorizer = new ModelCategorizer(capability, options, logger);

    await expect(categorizer.categorize('BLUE BOTTLE 0042', -6)).resolves.toEqual({
      category: 'Dining',
      subcategory: 'Coffee',
    });
    expect(capability.classify).toHaveBeenCalledWith(
      expect.objectContaining({ description: 'BLUE BOTTLE 0042', amount: -6 }),
      expect.objectContaining({ signal: expect.any(AbortSignal) }),
    );
  });

  it('should drop the subcategory of Other', async () => {
    const categorizer = new ModelCategorizer(capabilityReturning({ category: 'Other', subcategory: 'Misc' }), options, logger);

    await expect(categorizer.categorize('???', -1)).resolves.toEqual({ category: 'Other', subcategory: null });
  });

  it('should retry once before succeeding', async () => {
    const capability = capabilityReturning(new Error('socket hang up'), { category: 'Shopping', subcategory: null });
    const categorizer = new ModelCategorizer(capability, options, logger);

    await expect(categorizer.categorize('GIFT SHOP', -9)).resolves.toEqual({ category: 'Shopping', subcategory: null });
    expect(capability.classify).toHaveBeenCalledTimes(2);
  });

  it('should fail as unreachable after the retries are spent', async () => {
    const capability = capabilityReturning(new Error('down'), new Error('still down'));
    const categorizer = new ModelCategorizer(capability, options, logger);

    const failure = await categorizer.categorize('GIFT SHOP', -9).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(CategorizationUnavailable);
    expect(failure).toMatchObject({ reason: 'unreachable' });
    expect(capability.classify).toHaveBeenCalledTimes(2);
  });

  it('should fail as malformed output when the answer cannot be parsed', async () => {
    const capability = capabilityReturning(new SyntaxError('Unexpected token'), new SyntaxError('Unexpected end of JSON input'));
    const categorizer = new ModelCategorizer(capability, options, logger);

    const failure = await categorizer.categorize('GIFT SHOP', -9).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(CategorizationUnavailable);
    expect(failure).toMatchObject({ reason: 'malformed_output' });
    expect(capability.classify).toHaveBeenCalledTimes(2);
  });

  it('should reject categories outside the closed set', async () => {
    const categorizer = new ModelCategorizer(capabilityReturning({ category: 'Pets' }), options, logger);

    await expect(categorizer.categorize('PETCO 123', -30)).rejects.toMatchObject({ reason: 'invalid_category' });
  });

  it('should time out a call that never answers', async () => {
    const capability: ClassificationPort = { classify: () => new Promise(() => undefined) };
    const categorizer = new ModelCategorizer(capability, { timeoutMs: 10, retries: 0, backoffMs: 0 }, logger);

    await expect(categorizer.categorize('SLOW', -1)).rejects.toMatchObject({ reason: 'unreachable' });
  });
});
