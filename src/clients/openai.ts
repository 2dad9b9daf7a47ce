/**
 * Language model client backed by the OpenAI chat completions API
 */

import { OpenAI } from 'openai';
import type { CompletionRequest, LlmClient } from './types';
import { CollaboratorError, errorMessage } from '../lib/errors';

export interface OpenAiClientOptions {
  apiKey: string;
  model: string;
  timeout: number;
}

export class OpenAiClient implements LlmClient {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(options: OpenAiClientOptions) {
    // Retries are off: a failed call is handled per record by the stage
    this.client = new OpenAI({ apiKey: options.apiKey, timeout: options.timeout, maxRetries: 0 });
    this.model = options.model;
  }

  async complete({ prompt, systemRole, maxTokens }: CompletionRequest): Promise<string> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: systemRole },
          { role: 'user', content: prompt },
        ],
        max_tokens: maxTokens,
      });
      return response.choices[0]?.message?.content ?? '';
    } catch (error) {
      const status = error instanceof OpenAI.APIError ? error.status : undefined;
      throw new CollaboratorError(`OpenAI request failed: ${errorMessage(error)}`, 'llm', status);
    }
  }
}
