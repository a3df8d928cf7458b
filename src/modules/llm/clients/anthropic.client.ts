import { HttpService } from '@nestjs/axios';
import { InvokerConfig } from '../../core/config';
import {
  CompletionRequest,
  CompletionResponse,
} from '../interfaces/llm-client.interface';
import { ApiCallParams, BaseLLMClient, isRecord } from './base-llm.client';

export const ANTHROPIC_VERSION = '2023-06-01';

export class AnthropicClient extends BaseLLMClient {
  constructor(
    invokerConfig: InvokerConfig,
    httpService: HttpService,
  ) {
    super(invokerConfig, httpService, 'anthropic');
  }

  protected getDefaults() {
    return {
      baseUrl: 'https://api.anthropic.com/v1',
      model: 'claude-haiku-4-5',
    };
  }

  protected buildApiCallParams(
    request: Required<Omit<CompletionRequest, 'timeoutMs'>>,
  ): ApiCallParams {
    return {
      url: `${this.config.baseUrl}/messages`,
      headers: {
        'x-api-key': this.config.apiKey ?? '',
        'anthropic-version': ANTHROPIC_VERSION,
      },
      body: {
        model: request.model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        system: request.system,
        messages: [{ role: 'user', content: request.prompt }],
      },
    };
  }

  protected parseResponse(data: unknown): CompletionResponse {
    if (!isRecord(data) || !Array.isArray(data.content)) {
      throw this.invalidResponse('missing content blocks');
    }
    const blocks: unknown[] = data.content;
    const text = blocks
      .filter(
        (block): block is { type: 'text'; text: string } =>
          isRecord(block) && block.type === 'text' && typeof block.text === 'string',
      )
      .map((block) => block.text)
      .join('\n')
      .trim();
    if (!text) {
      throw this.invalidResponse('no text content');
    }
    const usage = isRecord(data.usage) ? data.usage : {};
    return {
      text,
      model: typeof data.model === 'string' ? data.model : this.config.model,
      usage: {
        inputTokens: typeof usage.input_tokens === 'number' ? usage.input_tokens : undefined,
        outputTokens: typeof usage.output_tokens === 'number' ? usage.output_tokens : undefined,
      },
    };
  }
}
