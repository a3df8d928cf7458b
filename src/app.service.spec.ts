import { Test, TestingModule } from '@nestjs/testing';
import { makeConfig } from './__tests__/helpers/fakes';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { INVOKER_CONFIG } from './modules/core/config';

describe('AppController', () => {
  let controller: AppController;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [AppController],
      providers: [AppService, { provide: INVOKER_CONFIG, useValue: makeConfig({ apiKey: undefined }) }],
    }).compile();

    controller = module.get<AppController>(AppController);
  });

  it('should report health', () => {
    expect(controller.getHealth().status).toBe('ok');
  });

  it('should report which secrets are configured without exposing them', () => {
    const status = controller.getStatus();

    expect(status.review).toEqual({
      provider: 'anthropic',
      model: undefined,
      triggerPhrase: '/ai-review',
      llmKeyConfigured: false,
      githubTokenConfigured: true,
    });
    expect(JSON.stringify(status)).not.toContain('test-token');
  });
});
