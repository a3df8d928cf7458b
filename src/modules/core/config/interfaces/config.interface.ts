export type LLMProviderName = 'anthropic' | 'openai' | 'deepseek';

export type ReviewMode = 'light' | 'strict';

/**
 * Per-repository overrides read from `.codereview.yaml` on the pull
 * request's head commit.
 */
export interface ProjectConfig {
  version: string;
  review: {
    mode: ReviewMode;
    language: string;
    /** Lowers the invoker's diff budget when set. */
    max_diff_chars?: number;
  };
  files: {
    exclude: string[];
  };
  /** Free text passed to the model alongside the diff. */
  context?: string;
}

export type ProjectReviewConfig = ProjectConfig['review'];

export type ProjectFilesConfig = ProjectConfig['files'];

export interface RetryPolicy {
  readonly maxRetries: number;
  readonly backoffMs: number;
}

/** Process-wide settings, resolved once at startup and never changed. */
export interface InvokerConfig {
  readonly provider: LLMProviderName;
  readonly apiKey?: string;
  readonly baseUrl?: string;
  readonly model?: string;
  readonly maxTokens: number;
  readonly temperature: number;
  readonly timeoutMs: number;
  readonly retry: RetryPolicy;
  readonly maxDiffChars: number;
  readonly triggerPhrase: string;
  readonly github: {
    readonly token?: string;
    readonly url: string;
  };
}
