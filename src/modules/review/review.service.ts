import { Inject, Injectable } from '@nestjs/common';
import {
  assertCredentials,
  INVOKER_CONFIG,
  InvokerConfig,
  parseConfig,
  PROJECT_CONFIG_FILES,
  ProjectConfig,
} from '../core/config';
import {
  EmptyDiffError,
  errorMessage,
  FetchError,
  isReviewError,
  PostError,
  ReviewError,
  UpstreamError,
  ConfigurationError,
} from '../core/errors';
import { logger } from '../core/logger';
import {
  GIT_CLIENT,
  GitClientInterface,
  PullRequestInfo,
} from '../git/interfaces/git-client.interface';
import {
  CompletionResponse,
  LLM_CLIENT,
  LLMClient,
} from '../llm/interfaces/llm-client.interface';
import { PromptBuilder, ReviewPrompt } from '../llm/prompts/prompt-builder';
import {
  describeTruncation,
  summarizeTruncation,
  truncateDiff,
  TruncationResult,
} from './diff-truncation.utils';
import {
  formatFailureComment,
  formatNeutralComment,
  formatReviewComment,
} from './review.formatter';
import { ReviewState, ReviewStateMachine } from './review-state';
import { ReviewRequest, ReviewResult } from './review.types';

const CONTEXT = 'ReviewService';

export interface GenerateReviewOptions {
  mode?: ProjectConfig['review']['mode'];
  language?: string;
  maxDiffChars?: number;
  exclude?: string[];
  title?: string;
  description?: string;
  projectContext?: string;
  extraContext?: string;
  /** Called before each completion attempt with its 1-based number. */
  onAttempt?: (attempt: number) => void;
}

export interface GeneratedReview {
  text: string;
  model: string;
  attempts: number;
  truncation: TruncationResult;
  truncationNote?: string;
}

interface FetchedPullRequest {
  info: PullRequestInfo;
  diff: string;
  projectConfig: ProjectConfig;
}

interface InvocationStats {
  attempts: number;
  truncation?: TruncationResult;
}

@Injectable()
export class ReviewService {
  constructor(
    @Inject(INVOKER_CONFIG) private readonly config: InvokerConfig,
    @Inject(LLM_CLIENT) private readonly llmClient: LLMClient,
    @Inject(GIT_CLIENT) private readonly gitClient: GitClientInterface,
  ) {}

  protected sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  /**
   * Runs one comment-triggered review end to end: fetch the diff, ask the
   * model, post exactly one comment. Never throws; the outcome is in the
   * returned result and in one structured log record.
   */
  async runReview(request: ReviewRequest): Promise<ReviewResult> {
    const startedAt = Date.now();
    const machine = new ReviewStateMachine();
    const stats: InvocationStats = { attempts: 0 };
    machine.transition('Triggered');
    logger.info(
      `Review requested for ${request.owner}/${request.repo}#${request.pullNumber} by ${request.requestedBy}`,
      CONTEXT,
    );

    let result: ReviewResult;
    try {
      result = await this.execute(request, machine, stats);
    } catch (error) {
      result = await this.handleFailure(
        request,
        machine,
        stats,
        this.toReviewError(error, machine.state),
      );
    }

    this.logInvocation(request, result, machine, stats, Date.now() - startedAt);
    return result;
  }

  /**
   * Truncates the diff and asks the model for a review. Shared by
   * {@link runReview} and the local CLI; posts nothing.
   */
  async generateReview(
    diff: string,
    options: GenerateReviewOptions = {},
  ): Promise<GeneratedReview> {
    assertCredentials(this.config, { platform: false });
    const truncation = this.prepareDiff(diff, options);
    return this.requestReview(truncation, options);
  }

  /**
   * A repository may lower the diff budget but never raise it above the
   * invoker's own limit.
   * @throws EmptyDiffError when nothing reviewable is left
   */
  prepareDiff(
    diff: string,
    options: Pick<GenerateReviewOptions, 'maxDiffChars' | 'exclude'> = {},
  ): TruncationResult {
    if (!diff.trim()) {
      throw new EmptyDiffError();
    }
    const truncation = truncateDiff(diff, {
      maxChars: Math.min(
        options.maxDiffChars ?? this.config.maxDiffChars,
        this.config.maxDiffChars,
      ),
      exclude: options.exclude,
    });
    if (!truncation.diff.trim()) {
      throw new EmptyDiffError(
        truncation.excludedFiles.length > 0
          ? 'Only excluded files changed'
          : 'The diff contains no textual changes',
        truncation.excludedFiles,
      );
    }
    if (truncation.truncated) {
      logger.warn(
        `Diff truncated from ${truncation.originalChars} to ${truncation.finalChars} chars, ${truncation.omitted.length} hunk(s) omitted`,
        CONTEXT,
      );
    }
    return truncation;
  }

  private async requestReview(
    truncation: TruncationResult,
    options: GenerateReviewOptions,
  ): Promise<GeneratedReview> {
    const truncationNote = describeTruncation(truncation);
    const prompt = PromptBuilder.buildReviewPrompt({
      diff: truncation.diff,
      mode: options.mode ?? 'strict',
      language: options.language ?? 'English',
      title: options.title,
      description: options.description,
      projectContext: options.projectContext,
      extraContext: options.extraContext,
      truncationNote,
    });

    let attempts = 0;
    const response = await this.completeWithRetry(prompt, (attempt) => {
      attempts = attempt;
      options.onAttempt?.(attempt);
    });

    return {
      text: response.text,
      model: response.model,
      attempts,
      truncation,
      truncationNote,
    };
  }

  private async completeWithRetry(
    prompt: ReviewPrompt,
    onAttempt: (attempt: number) => void,
  ): Promise<CompletionResponse> {
    const { maxRetries, backoffMs } = this.config.retry;
    for (let attempt = 0; ; attempt += 1) {
      if (attempt > 0) {
        await this.sleep(backoffMs * Math.pow(2, attempt - 1));
      }
      onAttempt(attempt + 1);
      try {
        return await this.llmClient.complete({
          system: prompt.system,
          prompt: prompt.prompt,
          timeoutMs: this.config.timeoutMs,
        });
      } catch (error) {
        const upstream =
          error instanceof UpstreamError
            ? error
            : new UpstreamError(
                `${this.llmClient.provider} request failed: ${errorMessage(error)}`,
                'network',
                { cause: error, provider: this.llmClient.provider },
              );
        if (!upstream.retryable || attempt >= maxRetries) {
          throw upstream;
        }
        logger.warn(
          `Attempt ${attempt + 1} failed (${upstream.reason}), retrying in ${backoffMs * Math.pow(2, attempt)}ms`,
          CONTEXT,
        );
      }
    }
  }

  private async execute(
    request: ReviewRequest,
    machine: ReviewStateMachine,
    stats: InvocationStats,
  ): Promise<ReviewResult> {
    assertCredentials(this.config, { platform: true });

    machine.transition('Fetching');
    const fetched = await this.fetchPullRequest(request);
    const reviewConfig = fetched.projectConfig.review;

    let truncation: TruncationResult;
    try {
      truncation = this.prepareDiff(fetched.diff, {
        maxDiffChars: reviewConfig.max_diff_chars,
        exclude: fetched.projectConfig.files.exclude,
      });
    } catch (error) {
      if (error instanceof EmptyDiffError) {
        return this.postNeutralComment(request, machine, stats, error);
      }
      throw error;
    }
    stats.truncation = truncation;

    machine.transition('Requesting');
    const review = await this.requestReview(truncation, {
      mode: reviewConfig.mode,
      language: reviewConfig.language,
      title: fetched.info.title,
      description: fetched.info.body,
      projectContext: fetched.projectConfig.context,
      onAttempt: (attempt) => {
        stats.attempts = attempt;
      },
    });

    machine.transition('Posting');
    const body = formatReviewComment({
      text: review.text,
      model: review.model,
      requestedBy: request.requestedBy,
      truncationNote: review.truncationNote,
    });
    const commentId = await this.postComment(request, body);
    machine.transition('Done');

    return {
      success: true,
      outcome: 'reviewed',
      body,
      commentId,
      state: machine.state,
      attempts: stats.attempts,
      truncation: summarizeTruncation(truncation),
    };
  }

  private async fetchPullRequest(request: ReviewRequest): Promise<FetchedPullRequest> {
    const { owner, repo, pullNumber } = request;
    const [info, diff] = await Promise.all([
      this.gitClient.getPullRequestInfo(owner, repo, pullNumber),
      this.gitClient.getPullRequestDiff(owner, repo, pullNumber),
    ]);
    const projectConfig = await this.getProjectConfig(owner, repo, info.headSha);
    logger.debug(
      `Fetched ${diff.length} chars of diff for "${info.title}" (${info.headRef}@${info.headSha})`,
      CONTEXT,
    );
    return { info, diff, projectConfig };
  }

  private async getProjectConfig(
    owner: string,
    repo: string,
    ref: string,
  ): Promise<ProjectConfig> {
    const contents = await Promise.all(
      PROJECT_CONFIG_FILES.map((path) =>
        this.gitClient.getContentAsText(owner, repo, path, ref),
      ),
    );
    return parseConfig(contents.find((content) => content !== null));
  }

  private async postNeutralComment(
    request: ReviewRequest,
    machine: ReviewStateMachine,
    stats: InvocationStats,
    reason: EmptyDiffError,
  ): Promise<ReviewResult> {
    logger.info(`Nothing to review: ${reason.message}`, CONTEXT);
    machine.transition('Posting');
    const body = formatNeutralComment({
      requestedBy: request.requestedBy,
      excludedFiles: reason.excludedFiles,
    });
    const commentId = await this.postComment(request, body);
    machine.transition('Done');
    return {
      success: true,
      outcome: 'empty-diff',
      body,
      commentId,
      state: machine.state,
      attempts: stats.attempts,
    };
  }

  /** Posts one comment, retrying a single time on failure. */
  private async postComment(request: ReviewRequest, body: string): Promise<number> {
    const { owner, repo, pullNumber } = request;
    try {
      return await this.gitClient.createPullRequestComment(owner, repo, pullNumber, body);
    } catch (error) {
      logger.warn(`Posting comment failed, retrying once: ${errorMessage(error)}`, CONTEXT);
    }
    await this.sleep(this.config.retry.backoffMs);
    try {
      return await this.gitClient.createPullRequestComment(owner, repo, pullNumber, body);
    } catch (error) {
      if (error instanceof PostError) {
        throw error;
      }
      throw new PostError(
        `Could not comment on ${owner}/${repo}#${pullNumber}: ${errorMessage(error)}`,
        { owner, repo, pullNumber },
        error,
      );
    }
  }

  private async handleFailure(
    request: ReviewRequest,
    machine: ReviewStateMachine,
    stats: InvocationStats,
    error: ReviewError,
  ): Promise<ReviewResult> {
    machine.fail(error.kind);
    logger.error(`Review failed in ${machine.history.slice(-2)[0]}: ${error.message}`, CONTEXT);

    const result: ReviewResult = {
      success: false,
      outcome: 'failed',
      body: '',
      error: { kind: error.kind, message: error.message },
      state: machine.state,
      attempts: stats.attempts,
      truncation: stats.truncation ? summarizeTruncation(stats.truncation) : undefined,
    };

    // configuration problems never touch the platform; a failed post has no other channel
    if (error instanceof ConfigurationError || error instanceof PostError) {
      return result;
    }

    const body = formatFailureComment({
      requestedBy: request.requestedBy,
      kind: error.kind,
      message: error.message,
    });
    try {
      result.commentId = await this.postComment(request, body);
      result.body = body;
    } catch (noticeError) {
      logger.error(`Failure notice could not be posted: ${errorMessage(noticeError)}`, CONTEXT);
    }
    return result;
  }

  private toReviewError(error: unknown, state: ReviewState): ReviewError {
    if (isReviewError(error)) {
      return error;
    }
    const message = errorMessage(error);
    switch (state) {
      case 'Fetching':
        return new FetchError(message, {}, error);
      case 'Requesting':
        return new UpstreamError(message, 'network', { cause: error });
      case 'Posting':
        return new PostError(message, {}, error);
      default:
        return new ConfigurationError(message);
    }
  }

  private logInvocation(
    request: ReviewRequest,
    result: ReviewResult,
    machine: ReviewStateMachine,
    stats: InvocationStats,
    latencyMs: number,
  ): void {
    logger.structured(
      'review.invocation',
      {
        repository: `${request.owner}/${request.repo}`,
        pullNumber: request.pullNumber,
        requestedBy: request.requestedBy,
        outcome: result.outcome,
        state: machine.toString(),
        latencyMs,
        errorKind: result.error?.kind,
        attempts: stats.attempts,
        commentId: result.commentId,
        truncated: stats.truncation?.truncated ?? false,
        omittedHunks: stats.truncation?.omitted.length ?? 0,
      },
      CONTEXT,
    );
  }
}
