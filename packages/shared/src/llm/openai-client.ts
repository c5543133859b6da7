/**
 * OpenAI-compatible chat completions client.
 *
 * Talks to any provider exposing the OpenAI chat completions API (OpenAI,
 * OpenRouter, ...). SDK retries are off.
 */

import OpenAI from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import { logger } from '../logger';
import { llmRequestsCounter, llmRequestDurationHistogram } from '../metrics';
import type { ModelClient, ModelCompletion, ModelRequest } from './types';

export interface OpenAIModelClientOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
}

export class OpenAIModelClient implements ModelClient {
  private readonly openai: OpenAI;

  constructor(options: OpenAIModelClientOptions) {
    this.openai = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  async complete(request: ModelRequest): Promise<ModelCompletion> {
    const startTime = Date.now();

    const params: ChatCompletionCreateParamsNonStreaming = {
      model: request.model,
      messages: request.messages,
      temperature: request.temperature,
    };
    if (request.responseSchema) {
      params.response_format = {
        type: 'json_schema',
        json_schema: request.responseSchema,
      };
    }

    try {
      const response = await this.openai.chat.completions.create(params);

      const duration = (Date.now() - startTime) / 1000;
      llmRequestDurationHistogram.observe({ model: request.model }, duration);
      llmRequestsCounter.inc({ model: request.model, status: 'success' });

      const requestId = response.id || `req_${Date.now()}`;
      logger.debug('Model request completed', {
        model: request.model,
        requestId,
        duration_seconds: duration,
      });

      return {
        content: response.choices[0]?.message?.content ?? null,
        model: response.model || request.model,
        requestId,
      };
    } catch (error) {
      const duration = (Date.now() - startTime) / 1000;
      llmRequestDurationHistogram.observe({ model: request.model }, duration);
      llmRequestsCounter.inc({ model: request.model, status: 'error' });
      throw error;
    }
  }
}
