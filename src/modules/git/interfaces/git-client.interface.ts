export interface PullRequestInfo {
  number: number;
  title: string;
  body: string;
  author: string;
  headRef: string;
  headSha: string;
  isDraft: boolean;
  url: string;
}

/**
 * What the review flow needs from the hosting platform: a diff source and a
 * comment sink.
 */
export interface GitClientInterface {
  /** @throws FetchError */
  getPullRequestInfo(
    owner: string,
    repo: string,
    pullNumber: number,
  ): Promise<PullRequestInfo>;

  /**
   * Unified diff of the whole pull request.
   * @throws FetchError
   */
  getPullRequestDiff(
    owner: string,
    repo: string,
    pullNumber: number,
  ): Promise<string>;

  /** Resolves to null when the file does not exist or cannot be read. */
  getContentAsText(
    owner: string,
    repo: string,
    path: string,
    ref?: string,
  ): Promise<string | null>;

  /**
   * Posts one comment on the pull request's conversation.
   * @returns id of the created comment
   * @throws PostError
   */
  createPullRequestComment(
    owner: string,
    repo: string,
    pullNumber: number,
    body: string,
  ): Promise<number>;
}

export const GIT_CLIENT = Symbol('GIT_CLIENT');
