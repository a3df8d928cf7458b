import { HttpService } from '@nestjs/axios';
import { InvokerConfig, LLMProviderName } from '../../core/config';
import {
  CompletionRequest,
  CompletionResponse,
} from '../interfaces/llm-client.interface';
import { ApiCallParams, BaseLLMClient, isRecord } from './base-llm.client';

/** Chat Completions API, shared by OpenAI-compatible providers. */
export class OpenAIClient extends BaseLLMClient {
  constructor(
    invokerConfig: InvokerConfig,
    httpService: HttpService,
    provider: LLMProviderName = 'openai',
  ) {
    super(invokerConfig, httpService, provider);
  }

  protected getDefaults() {
    return {
      baseUrl: 'https://api.openai.com/v1',
      model: 'gpt-4o-mini',
    };
  }

  protected buildApiCallParams(
    request: Required<Omit<CompletionRequest, 'timeoutMs'>>,
  ): ApiCallParams {
    return {
      url: `${this.config.baseUrl}/chat/completions`,
      headers: {
        Authorization: `Bearer ${this.config.apiKey ?? ''}`,
      },
      body: {
        model: request.model,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.prompt },
        ],
        temperature: request.temperature,
        max_tokens: request.maxTokens,
      },
    };
  }

  protected parseResponse(data: unknown): CompletionResponse {
    const choices: unknown[] =
      isRecord(data) && Array.isArray(data.choices) ? data.choices : [];
    const choice = choices[0];
    const message = isRecord(choice) ? choice.message : undefined;
    const content = isRecord(message) ? message.content : undefined;
    if (typeof content !== 'string' || !content.trim()) {
      throw this.invalidResponse('no message content');
    }
    const usage = isRecord(data) && isRecord(data.usage) ? data.usage : {};
    return {
      text: content.trim(),
      model: isRecord(data) && typeof data.model === 'string' ? data.model : this.config.model,
      usage: {
        inputTokens: typeof usage.prompt_tokens === 'number' ? usage.prompt_tokens : undefined,
        outputTokens:
          typeof usage.completion_tokens === 'number' ? usage.completion_tokens : undefined,
      },
    };
  }
}
