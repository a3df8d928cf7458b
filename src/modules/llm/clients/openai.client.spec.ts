import { HttpService } from '@nestjs/axios';
import { of } from 'rxjs';
import { makeConfig } from '../../../__tests__/helpers/fakes';
import { DeepSeekClient } from './deepseek.client';
import { OpenAIClient } from './openai.client';

describe('OpenAIClient', () => {
  let httpService: { post: jest.Mock };

  beforeEach(() => {
    httpService = { post: jest.fn() };
  });

  it('should call the Chat Completions API', async () => {
    const client = new OpenAIClient(
      makeConfig({ provider: 'openai' }),
      httpService as unknown as HttpService,
    );
    httpService.post.mockReturnValue(
      of({
        data: {
          model: 'gpt-4o-mini',
          choices: [{ message: { role: 'assistant', content: ' ## Summary\nok ' } }],
          usage: { prompt_tokens: 10, completion_tokens: 5 },
        },
      }),
    );

    const response = await client.complete({ system: 'sys', prompt: 'diff' });

    expect(response).toEqual({
      text: '## Summary\nok',
      model: 'gpt-4o-mini',
      usage: { inputTokens: 10, outputTokens: 5 },
    });
    expect(client.provider).toBe('openai');
    expect(httpService.post).toHaveBeenCalledWith(
      'https://api.openai.com/v1/chat/completions',
      {
        model: 'gpt-4o-mini',
        messages: [
          { role: 'system', content: 'sys' },
          { role: 'user', content: 'diff' },
        ],
        temperature: 0.2,
        max_tokens: 4000,
      },
      {
        headers: {
          'Content-Type': 'application/json',
          Authorization: 'Bearer test-secret',
        },
        timeout: 1000,
      },
    );
  });

  it('should reject an empty choice list', async () => {
    const client = new OpenAIClient(makeConfig(), httpService as unknown as HttpService);
    httpService.post.mockReturnValue(of({ data: { choices: [] } }));

    await expect(client.complete({ system: 's', prompt: 'p' })).rejects.toMatchObject({
      reason: 'invalid_response',
    });
  });
});

describe('DeepSeekClient', () => {
  it('should use the DeepSeek endpoint and model', async () => {
    const httpService = { post: jest.fn() };
    const client = new DeepSeekClient(
      makeConfig({ provider: 'deepseek' }),
      httpService as unknown as HttpService,
    );
    httpService.post.mockReturnValue(of({ data: { choices: [{ message: { content: 'ok' } }] } }));

    const response = await client.complete({ system: 's', prompt: 'p' });

    expect(client.provider).toBe('deepseek');
    expect(response.model).toBe('deepseek-coder');
    expect(httpService.post.mock.calls[0][0]).toBe('https://api.deepseek.com/v1/chat/completions');
    expect(httpService.post.mock.calls[0][1].model).toBe('deepseek-coder');
  });
});
