import { HttpService } from '@nestjs/axios';
import { isAxiosError } from 'axios';
import { firstValueFrom } from 'rxjs';
import {
  InvokerConfig,
  LLMProviderName,
} from '../../core/config';
import { errorMessage, UpstreamError } from '../../core/errors';
import {
  CompletionRequest,
  CompletionResponse,
  LLMClient,
  LLMConfig,
} from '../interfaces/llm-client.interface';

export interface ApiCallParams {
  url: string;
  headers: Record<string, string>;
  body: Record<string, unknown>;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export abstract class BaseLLMClient implements LLMClient {
  protected config: LLMConfig;

  constructor(
    protected invokerConfig: InvokerConfig,
    protected httpService: HttpService,
    readonly provider: LLMProviderName,
  ) {
    this.config = this.resolveConfig();
  }

  /** Provider defaults; invoker settings take precedence. */
  protected abstract getDefaults(): Pick<LLMConfig, 'baseUrl' | 'model'>;

  protected abstract buildApiCallParams(
    request: Required<Omit<CompletionRequest, 'timeoutMs'>>,
  ): ApiCallParams;

  protected abstract parseResponse(data: unknown): CompletionResponse;

  private resolveConfig(): LLMConfig {
    const defaults = this.getDefaults();
    return {
      apiKey: this.invokerConfig.apiKey,
      baseUrl: (this.invokerConfig.baseUrl || defaults.baseUrl).replace(/\/+$/, ''),
      model: this.invokerConfig.model || defaults.model,
      temperature: this.invokerConfig.temperature,
      maxTokens: this.invokerConfig.maxTokens,
      timeoutMs: this.invokerConfig.timeoutMs,
    };
  }

  getModel(): string {
    return this.config.model;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const { url, headers, body } = this.buildApiCallParams({
      system: request.system,
      prompt: request.prompt,
      model: request.model || this.config.model,
      maxTokens: request.maxTokens ?? this.config.maxTokens,
      temperature: request.temperature ?? this.config.temperature,
    });

    let data: unknown;
    try {
      const response = await firstValueFrom(
        this.httpService.post<unknown>(url, body, {
          headers: { 'Content-Type': 'application/json', ...headers },
          timeout: request.timeoutMs ?? this.config.timeoutMs,
        }),
      );
      data = response.data;
    } catch (error) {
      throw this.toUpstreamError(error);
    }

    return this.parseResponse(data);
  }

  protected invalidResponse(detail: string): UpstreamError {
    return new UpstreamError(
      `${this.provider} API returned an unexpected response: ${detail}`,
      'invalid_response',
      { provider: this.provider },
    );
  }

  protected toUpstreamError(error: unknown): UpstreamError {
    if (error instanceof UpstreamError) {
      return error;
    }
    if (isAxiosError(error)) {
      if (error.response) {
        const status = error.response.status;
        const detail = extractErrorDetail(error.response.data);
        return new UpstreamError(
          `${this.provider} API error: HTTP ${status}${detail ? ` (${detail})` : ''}`,
          UpstreamError.reasonForStatus(status),
          { status, cause: error, provider: this.provider },
        );
      }
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new UpstreamError(
          `${this.provider} API request timed out after ${this.config.timeoutMs}ms`,
          'timeout',
          { cause: error, provider: this.provider },
        );
      }
    }
    return new UpstreamError(
      `${this.provider} API request failed: ${errorMessage(error)}`,
      'network',
      { cause: error, provider: this.provider },
    );
  }
}

/** Pulls the provider's machine-readable reason out of an error body. */
export function extractErrorDetail(data: unknown): string | undefined {
  if (!isRecord(data)) {
    return typeof data === 'string' && data.trim() ? data.trim().slice(0, 200) : undefined;
  }
  const error = data.error;
  if (isRecord(error)) {
    const code = error.type ?? error.code;
    const message = error.message;
    return [code, message].filter((part) => typeof part === 'string' && part).join(': ') || undefined;
  }
  if (typeof error === 'string') {
    return error;
  }
  return typeof data.message === 'string' ? data.message : undefined;
}
