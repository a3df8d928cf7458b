import { HttpService } from '@nestjs/axios';
import { InvokerConfig } from '../../core/config';
import { OpenAIClient } from './openai.client';

export class DeepSeekClient extends OpenAIClient {
  constructor(
    invokerConfig: InvokerConfig,
    httpService: HttpService,
  ) {
    super(invokerConfig, httpService, 'deepseek');
  }

  protected getDefaults() {
    return {
      baseUrl: 'https://api.deepseek.com/v1',
      model: 'deepseek-coder',
    };
  }
}
