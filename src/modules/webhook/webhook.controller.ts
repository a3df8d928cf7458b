import {
  BadRequestException,
  Body,
  Controller,
  Headers,
  HttpCode,
  HttpStatus,
  Post,
} from '@nestjs/common';
import { ConfigurationError } from '../core/errors';
import { logger } from '../core/logger';
import { WebhookOutcome, WebhookService } from './webhook.service';

@Controller('review')
export class WebhookController {
  constructor(private readonly webhookService: WebhookService) {}

  @Post('webhook')
  @HttpCode(HttpStatus.OK)
  async handleWebhook(
    @Body() body: unknown,
    @Headers('x-github-event') githubEvent: string | undefined,
  ): Promise<WebhookOutcome> {
    if (!githubEvent) {
      throw new BadRequestException('Missing X-GitHub-Event header');
    }
    logger.info(`Received GitHub event ${githubEvent}`, 'WebhookController');
    try {
      return await this.webhookService.handleGitHubEvent(githubEvent, body);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw new BadRequestException(error.toJSON());
      }
      throw error;
    }
  }
}
