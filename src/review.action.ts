import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import * as fs from 'fs';
import { AppModule } from './app.module';
import { errorMessage } from './modules/core/errors';
import { logger } from './modules/core/logger';
import { exitCodeFor } from './modules/review/review.utils';
import { WebhookService } from './modules/webhook/webhook.service';

/** Entry point for the CI job started by an `issue_comment` event. */
async function bootstrap(): Promise<number> {
  const eventName = process.env.GITHUB_EVENT_NAME;
  const eventPath = process.env.GITHUB_EVENT_PATH;
  if (!eventName || !eventPath) {
    logger.error('GITHUB_EVENT_NAME and GITHUB_EVENT_PATH must be set', 'ReviewAction');
    return 1;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(fs.readFileSync(eventPath, 'utf8'));
  } catch (error) {
    logger.error(`Cannot read event payload ${eventPath}: ${errorMessage(error)}`, 'ReviewAction');
    return 1;
  }

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn'],
  });
  try {
    logger.info(`🔹 GitHub Action detected: ${eventName}`, 'ReviewAction');
    const outcome = await app.get(WebhookService).handleGitHubEvent(eventName, payload);
    return exitCodeFor(outcome.status === 'completed' ? outcome.result : null);
  } finally {
    await app.close();
  }
}

bootstrap()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error(`Review action failed: ${errorMessage(error)}`, 'ReviewAction');
    process.exitCode = 1;
  });
