import { HttpModule } from '@nestjs/axios';
import { MODULE_METADATA } from '@nestjs/common/constants';
import { AppModule } from './app.module';
import { LlmModule } from './modules/llm/llm.module';

const importedModules = (target: object): unknown[] =>
  (Reflect.getMetadata(MODULE_METADATA.IMPORTS, target) ?? []).map(
    (entry: { module?: unknown }) => entry.module ?? entry,
  );

describe('AppModule', () => {
  it('should leave the HTTP client to the LLM module', () => {
    expect(importedModules(AppModule)).not.toContain(HttpModule);
    expect(importedModules(LlmModule)).toContain(HttpModule);
  });
});
