import { HttpModule } from '@nestjs/axios';
import { Module } from '@nestjs/common';
import { LLM_CLIENT } from './interfaces/llm-client.interface';
import { LLMFactory } from './llm.factory';

@Module({
  imports: [HttpModule],
  providers: [
    LLMFactory,
    {
      provide: LLM_CLIENT,
      inject: [LLMFactory],
      useFactory: (factory: LLMFactory) => factory.getClient(),
    },
  ],
  exports: [LLMFactory, LLM_CLIENT],
})
export class LlmModule {}
