import OpenAI from 'openai';
import { StructuredExtractionPort, StructuredExtractionRequest } from '../../../application/ports/StructuredExtractionPort.js';

export interface OpenAIStructuredExtractionOptions {
  model: string;
  maxTokens: number;
}

export class OpenAIStructuredExtraction implements StructuredExtractionPort {
  constructor(
    private readonly client: OpenAI,
    private readonly options: OpenAIStructuredExtractionOptions,
  ) {}

  async extract(request: StructuredExtractionRequest, options: { signal: AbortSignal }): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: this.options.model,
        messages: [
          { role: 'system', content: request.schemaDescription },
          { role: 'user', content: `Statement:\n${request.documentText}` },
        ],
        temperature: 0,
        max_tokens: this.options.maxTokens,
      },
      { signal: options.signal },
    );

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error('No response content from extraction model');
    }

    return content;
  }
}
