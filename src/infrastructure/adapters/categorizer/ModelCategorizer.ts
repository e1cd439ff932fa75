import { ZodError } from 'zod';
import { CATEGORIES, OTHER_CATEGORY, resolveCategory } from '../../../domain/entities/Category.js';
import { CategoryAssignment } from '../../../domain/entities/Transaction.js';
import { CategorizationUnavailable, describeError } from '../../../domain/errors.js';
import { ClassificationResponseDTO } from '../../../application/dto/ClassificationDTO.js';
import { ModelCategorizerPort } from '../../../application/ports/CategorizerPort.js';
import { ClassificationPort } from '../../../application/ports/ClassificationPort.js';
import { LoggerPort } from '../../../application/ports/LoggerPort.js';
import { callWithTimeout, retryWithBackoff } from '../../http/ResilientCall.js';

export interface ModelCategorizerOptions {
  timeoutMs: number;
  retries: number;
  backoffMs: number;
}

export class ModelCategorizer implements ModelCategorizerPort {
  constructor(
    private readonly capability: ClassificationPort,
    private readonly options: ModelCategorizerOptions,
    private readonly logger: LoggerPort,
  ) {}

  async categorize(description: string, amount: number): Promise<CategoryAssignment> {
    let response: ClassificationResponseDTO;

    try {
      response = await retryWithBackoff(
        () =>
          callWithTimeout(
            (signal) => this.capability.classify({ description, amount, allowedCategories: CATEGORIES }, { signal }),
            this.options.timeoutMs,
          ),
        {
          retries: this.options.retries,
          backoffMs: this.options.backoffMs,
          onRetry: (error, attempt) =>
            this.logger.debug('Retrying classification', { description, attempt, error: describeError(error) }),
        },
      );
    } catch (error) {
      // The capability parses the model's JSON answer against the response schema.
      const malformed = error instanceof SyntaxError || error instanceof ZodError;
      throw new CategorizationUnavailable(
        malformed ? 'malformed_output' : 'unreachable',
        `Classification failed: ${describeError(error)}`,
        { cause: error },
      );
    }

    const category = resolveCategory(response.category);
    if (!category) {
      throw new CategorizationUnavailable(
        'invalid_category',
        `Classification returned unknown category "${response.category}"`,
      );
    }

    const subcategory = response.subcategory?.trim() || null;
    return { category, subcategory: category === OTHER_CATEGORY ? null : subcategory };
  }
}
