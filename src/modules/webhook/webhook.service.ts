import { Inject, Injectable } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync, ValidationError } from 'class-validator';
import { INVOKER_CONFIG, InvokerConfig } from '../core/config';
import { ConfigurationError } from '../core/errors';
import { logger } from '../core/logger';
import { ReviewService } from '../review/review.service';
import { ReviewResult } from '../review/review.types';
import { shouldTriggerReview, TRIGGER_EVENT } from '../review/review.utils';
import { IssueCommentEventDto } from './dto/webhook.dto';

export type WebhookOutcome =
  | { status: 'ignored'; reason: string }
  | { status: 'completed'; result: ReviewResult };

function formatValidationErrors(errors: ValidationError[], parent = ''): string[] {
  return errors.flatMap((error) => {
    const path = parent ? `${parent}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) => `${path}: ${message}`);
    return [...own, ...formatValidationErrors(error.children ?? [], path)];
  });
}

@Injectable()
export class WebhookService {
  constructor(
    @Inject(INVOKER_CONFIG) private readonly config: InvokerConfig,
    private readonly reviewService: ReviewService,
  ) {}

  /**
   * Handles one GitHub event. Anything that is not a new trigger comment on
   * a pull request is ignored without touching the network.
   *
   * @throws ConfigurationError when an `issue_comment` payload is malformed
   */
  async handleGitHubEvent(eventName: string, payload: unknown): Promise<WebhookOutcome> {
    if (eventName !== TRIGGER_EVENT) {
      logger.debug(`Ignoring GitHub event ${eventName}`, 'WebhookService');
      return { status: 'ignored', reason: `unsupported event ${eventName}` };
    }

    const event = this.parseIssueComment(payload);
    const decision = shouldTriggerReview(event, this.config.triggerPhrase);
    if (!decision.trigger) {
      logger.info(`No review: ${decision.reason}`, 'WebhookService');
      return { status: 'ignored', reason: decision.reason };
    }

    const result = await this.reviewService.runReview(decision.request);
    return { status: 'completed', result };
  }

  private parseIssueComment(payload: unknown): IssueCommentEventDto {
    if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
      throw new ConfigurationError('issue_comment payload must be a JSON object');
    }
    const event = plainToInstance(IssueCommentEventDto, payload);
    const problems = formatValidationErrors(validateSync(event));
    if (problems.length > 0) {
      logger.error(`Malformed issue_comment payload: ${problems.join('; ')}`, 'WebhookService');
      throw new ConfigurationError('Malformed issue_comment payload', { problems });
    }
    return event;
  }
}
