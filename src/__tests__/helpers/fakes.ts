import { InvokerConfig } from '../../modules/core/config';
import { PostError, UpstreamError } from '../../modules/core/errors';
import {
  GitClientInterface,
  PullRequestInfo,
} from '../../modules/git/interfaces/git-client.interface';
import {
  CompletionRequest,
  CompletionResponse,
  LLMClient,
} from '../../modules/llm/interfaces/llm-client.interface';

export function makeConfig(overrides: Partial<InvokerConfig> = {}): InvokerConfig {
  return {
    provider: 'anthropic',
    apiKey: 'test-secret',
    maxTokens: 4000,
    temperature: 0.2,
    timeoutMs: 1000,
    retry: { maxRetries: 2, backoffMs: 0 },
    maxDiffChars: 60_000,
    triggerPhrase: '/ai-review',
    github: { token: 'test-token', url: 'https://api.github.com' },
    ...overrides,
  };
}

export const SAMPLE_DIFF = [
  'diff --git a/src/app.ts b/src/app.ts',
  'index 1111111..2222222 100644',
  '--- a/src/app.ts',
  '+++ b/src/app.ts',
  '@@ -1,2 +1,3 @@',
  ' const a = 1;',
  '+const b = 2;',
  ' export { a };',
  '',
].join('\n');

export const REVIEW_TEXT = [
  '## Summary',
  'Adds a constant.',
  '## Critical Issues',
  'None.',
].join('\n');

export function makePullRequestInfo(overrides: Partial<PullRequestInfo> = {}): PullRequestInfo {
  return {
    number: 7,
    title: 'Add constant',
    body: 'Small change',
    author: 'octocat',
    headRef: 'feature/constant',
    headSha: 'abc123',
    isDraft: false,
    url: 'https://github.com/acme/widgets/pull/7',
    ...overrides,
  };
}

/** In-memory git host recording every posted comment. */
export class FakeGitClient implements GitClientInterface {
  diff = SAMPLE_DIFF;
  info = makePullRequestInfo();
  files: Record<string, string> = {};
  /** Refs that repository files were read at. */
  contentRefs: (string | undefined)[] = [];
  comments: string[] = [];
  calls = 0;
  /** Number of upcoming comment posts that should fail. */
  failPosts = 0;
  fetchError?: Error;

  async getPullRequestInfo(): Promise<PullRequestInfo> {
    this.calls += 1;
    if (this.fetchError) {
      throw this.fetchError;
    }
    return this.info;
  }

  async getPullRequestDiff(): Promise<string> {
    this.calls += 1;
    if (this.fetchError) {
      throw this.fetchError;
    }
    return this.diff;
  }

  async getContentAsText(
    _owner: string,
    _repo: string,
    path: string,
    ref?: string,
  ): Promise<string | null> {
    this.calls += 1;
    this.contentRefs.push(ref);
    return this.files[path] ?? null;
  }

  async createPullRequestComment(
    _owner: string,
    _repo: string,
    _pullNumber: number,
    body: string,
  ): Promise<number> {
    this.calls += 1;
    if (this.failPosts > 0) {
      this.failPosts -= 1;
      throw new PostError('comment rejected', { status: 500 });
    }
    this.comments.push(body);
    return 1000 + this.comments.length;
  }
}

type Step = CompletionResponse | Error;

/** Language model that plays back a script of responses and failures. */
export class ScriptedLLMClient implements LLMClient {
  readonly provider = 'anthropic';
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly script: Step[] = []) {}

  get calls(): number {
    return this.requests.length;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    this.requests.push(request);
    const step = this.script.shift() ?? { text: REVIEW_TEXT, model: 'claude-haiku-4-5' };
    if (step instanceof Error) {
      throw step;
    }
    return step;
  }
}

export const timeoutError = (): UpstreamError =>
  new UpstreamError('anthropic API request timed out after 1000ms', 'timeout', {
    provider: 'anthropic',
  });

export function makeIssueCommentEvent(
  overrides: {
    action?: string;
    body?: string;
    login?: string;
    userType?: string;
    onPullRequest?: boolean;
  } = {},
): Record<string, unknown> {
  return {
    action: overrides.action ?? 'created',
    issue: {
      number: 7,
      title: 'Add constant',
      ...(overrides.onPullRequest === false
        ? {}
        : { pull_request: { url: 'https://api.github.com/repos/acme/widgets/pulls/7' } }),
    },
    comment: {
      id: 42,
      body: overrides.body ?? 'Please take a look /ai-review',
      user: { login: overrides.login ?? 'octocat', type: overrides.userType ?? 'User' },
    },
    repository: {
      name: 'widgets',
      full_name: 'acme/widgets',
      owner: { login: 'acme', type: 'Organization' },
    },
  };
}
