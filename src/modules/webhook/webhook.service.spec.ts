import { Test, TestingModule } from '@nestjs/testing';
import { makeConfig, makeIssueCommentEvent } from '../../__tests__/helpers/fakes';
import { INVOKER_CONFIG } from '../core/config';
import { ConfigurationError } from '../core/errors';
import { logger } from '../core/logger';
import { ReviewService } from '../review/review.service';
import { ReviewResult } from '../review/review.types';
import { WebhookService } from './webhook.service';

describe('WebhookService', () => {
  let service: WebhookService;
  let reviewService: { runReview: jest.Mock<Promise<ReviewResult>, [unknown]> };

  const reviewed: ReviewResult = {
    success: true,
    outcome: 'reviewed',
    body: 'review',
    commentId: 1001,
    state: 'Done',
    attempts: 1,
  };

  beforeEach(async () => {
    reviewService = { runReview: jest.fn().mockResolvedValue(reviewed) };
    jest.spyOn(logger, 'info').mockImplementation(() => undefined);
    jest.spyOn(logger, 'error').mockImplementation(() => undefined);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        WebhookService,
        { provide: INVOKER_CONFIG, useValue: makeConfig() },
        { provide: ReviewService, useValue: reviewService },
      ],
    }).compile();

    service = module.get<WebhookService>(WebhookService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should run a review for a trigger comment', async () => {
    const outcome = await service.handleGitHubEvent('issue_comment', makeIssueCommentEvent());

    expect(outcome).toEqual({ status: 'completed', result: reviewed });
    expect(reviewService.runReview).toHaveBeenCalledTimes(1);
    expect(reviewService.runReview).toHaveBeenCalledWith({
      owner: 'acme',
      repo: 'widgets',
      pullNumber: 7,
      requestedBy: 'octocat',
      triggerPhrase: '/ai-review',
      triggerCommentId: 42,
    });
  });

  it('should ignore other events', async () => {
    const outcome = await service.handleGitHubEvent('push', { ref: 'refs/heads/main' });

    expect(outcome).toEqual({ status: 'ignored', reason: 'unsupported event push' });
    expect(reviewService.runReview).not.toHaveBeenCalled();
  });

  it('should ignore comments without the phrase', async () => {
    const outcome = await service.handleGitHubEvent(
      'issue_comment',
      makeIssueCommentEvent({ body: 'Looks good to me' }),
    );

    expect(outcome).toEqual({ status: 'ignored', reason: 'trigger phrase not present' });
    expect(reviewService.runReview).not.toHaveBeenCalled();
  });

  it('should ignore trigger comments on plain issues', async () => {
    const outcome = await service.handleGitHubEvent(
      'issue_comment',
      makeIssueCommentEvent({ onPullRequest: false }),
    );

    expect(outcome.status).toBe('ignored');
    expect(reviewService.runReview).not.toHaveBeenCalled();
  });

  it('should reject a payload that is not an object', async () => {
    await expect(service.handleGitHubEvent('issue_comment', 'nope')).rejects.toThrow(
      'issue_comment payload must be a JSON object',
    );
  });

  it('should list what is wrong with a malformed payload', async () => {
    const payload = makeIssueCommentEvent();
    delete payload.comment;

    const error = await service.handleGitHubEvent('issue_comment', payload).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({
      message: 'Malformed issue_comment payload',
      context: { problems: ['comment: comment should not be null or undefined'] },
    });
    expect(reviewService.runReview).not.toHaveBeenCalled();
  });
});
