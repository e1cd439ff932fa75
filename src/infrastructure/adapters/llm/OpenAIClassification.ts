import OpenAI from 'openai';
import {
  ClassificationRequestDTO,
  ClassificationResponseDTO,
  ClassificationResponseSchema,
} from '../../../application/dto/ClassificationDTO.js';
import { ClassificationPort } from '../../../application/ports/ClassificationPort.js';

export interface OpenAIClassificationOptions {
  model: string;
}

const buildPrompt = (request: ClassificationRequestDTO): string => `Categorize this bank transaction.

Allowed categories: ${request.allowedCategories.join(', ')}

Transaction: ${request.description}
Amount: ${request.amount.toFixed(2)} (negative = money out, positive = money in)

Respond with ONLY a JSON object: {"category": "<one of the allowed categories>", "subcategory": "<short label or null>"}`;

export class OpenAIClassification implements ClassificationPort {
  constructor(
    private readonly client: OpenAI,
    private readonly options: OpenAIClassificationOptions,
  ) {}

  async classify(request: ClassificationRequestDTO, options: { signal: AbortSignal }): Promise<ClassificationResponseDTO> {
    const response = await this.client.chat.completions.create(
      {
        model: this.options.model,
        messages: [{ role: 'user', content: buildPrompt(request) }],
        temperature: 0,
        max_tokens: 60,
        response_format: { type: 'json_object' },
      },
      { signal: options.signal },
    );

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error('No response content from classification model');
    }

    return ClassificationResponseSchema.parse(JSON.parse(content));
  }
}
