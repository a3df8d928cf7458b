import { HttpService } from '@nestjs/axios';
import { Inject, Injectable } from '@nestjs/common';
import {
  INVOKER_CONFIG,
  InvokerConfig,
  LLMProviderName,
} from '../core/config';
import { ConfigurationError } from '../core/errors';
import { AnthropicClient } from './clients/anthropic.client';
import { DeepSeekClient } from './clients/deepseek.client';
import { OpenAIClient } from './clients/openai.client';
import { LLMClient } from './interfaces/llm-client.interface';

@Injectable()
export class LLMFactory {
  constructor(
    @Inject(INVOKER_CONFIG) private invokerConfig: InvokerConfig,
    private httpService: HttpService,
  ) {}

  getClient(provider: LLMProviderName = this.invokerConfig.provider): LLMClient {
    switch (provider) {
      case 'anthropic':
        return new AnthropicClient(this.invokerConfig, this.httpService);
      case 'openai':
        return new OpenAIClient(this.invokerConfig, this.httpService);
      case 'deepseek':
        return new DeepSeekClient(this.invokerConfig, this.httpService);
      default:
        throw new ConfigurationError(`Unknown LLM provider: ${String(provider)}`);
    }
  }
}
