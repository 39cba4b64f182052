// src/services/llm/GroqCompletionModel.ts
import Groq from 'groq-sdk';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { ModelCallError, errorMessage } from '../errors';
import { CompletionModel, CompletionOptions } from './types';

export interface GroqCompletionModelConfig extends ServiceConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
  /** SDK-level retries; the compiler itself never retries a model call */
  maxRetries?: number;
}

export class GroqCompletionModel extends BaseService implements CompletionModel {
  private client: Groq;
  private model: string;
  private maxTokens: number;
  private maxRetries: number;

  constructor(config: GroqCompletionModelConfig) {
    super(config);
    if (!config.apiKey) {
      throw new Error('GROQ_API_KEY is required for GroqCompletionModel');
    }
    this.client = new Groq({ apiKey: config.apiKey });
    this.model = config.model;
    this.maxTokens = config.maxTokens;
    this.maxRetries = config.maxRetries ?? 0;
  }

  public async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const startedAt = Date.now();
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [{ role: 'user', content: prompt }],
          temperature: 0,
          max_tokens: this.maxTokens,
          response_format: { type: 'json_object' },
          stream: false,
        },
        { timeout: options.timeoutMs, signal: options.signal, maxRetries: this.maxRetries },
      );

      const content = response.choices[0]?.message?.content ?? '';
      this.logger.debug('GroqCompletionModel: Completion received', {
        model: this.model,
        durationMs: Date.now() - startedAt,
        totalTokens: response.usage?.total_tokens,
      });
      return content;
    } catch (error) {
      const timedOut = error instanceof Groq.APIConnectionTimeoutError;
      this.logger.error('GroqCompletionModel: Completion failed', {
        model: this.model,
        timedOut,
        error: errorMessage(error),
      });
      throw new ModelCallError(`Groq API error: ${errorMessage(error)}`, { cause: error, timedOut });
    }
  }
}
