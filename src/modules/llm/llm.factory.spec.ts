import { HttpService } from '@nestjs/axios';
import { Test, TestingModule } from '@nestjs/testing';
import { makeConfig } from '../../__tests__/helpers/fakes';
import { INVOKER_CONFIG } from '../core/config';
import { AnthropicClient } from './clients/anthropic.client';
import { DeepSeekClient } from './clients/deepseek.client';
import { OpenAIClient } from './clients/openai.client';
import { LLMFactory } from './llm.factory';

describe('LLMFactory', () => {
  let factory: LLMFactory;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        LLMFactory,
        { provide: INVOKER_CONFIG, useValue: makeConfig({ provider: 'openai' }) },
        { provide: HttpService, useValue: { post: jest.fn() } },
      ],
    }).compile();

    factory = module.get<LLMFactory>(LLMFactory);
  });

  it('should build the configured provider by default', () => {
    expect(factory.getClient()).toBeInstanceOf(OpenAIClient);
  });

  it('should build each supported provider', () => {
    expect(factory.getClient('anthropic')).toBeInstanceOf(AnthropicClient);
    expect(factory.getClient('deepseek')).toBeInstanceOf(DeepSeekClient);
  });
});
