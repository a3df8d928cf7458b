import { LLMProviderName } from '../../core/config';

export interface CompletionRequest {
  system: string;
  prompt: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  timeoutMs?: number;
}

export interface CompletionUsage {
  inputTokens?: number;
  outputTokens?: number;
}

export interface CompletionResponse {
  text: string;
  model: string;
  usage?: CompletionUsage;
}

export interface LLMClient {
  readonly provider: LLMProviderName;
  /**
   * Issues exactly one completion request. Failures surface as
   * `UpstreamError`; retrying is the caller's decision.
   */
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

export interface LLMConfig {
  apiKey?: string;
  baseUrl: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

export const LLM_CLIENT = Symbol('LLM_CLIENT');
