import { Octokit } from '@octokit/rest';
import { errorMessage, FetchError, PostError } from '../../core/errors';
import { logger } from '../../core/logger';
import {
  GitClientInterface,
  PullRequestInfo,
} from '../interfaces/git-client.interface';

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    return typeof error.status === 'number' ? error.status : undefined;
  }
  return undefined;
}

export class GitHubClient implements GitClientInterface {
  constructor(private readonly octokit: Octokit) {}

  async getPullRequestInfo(
    owner: string,
    repo: string,
    pullNumber: number,
  ): Promise<PullRequestInfo> {
    try {
      const { data: prData } = await this.octokit.rest.pulls.get({
        owner,
        repo,
        pull_number: pullNumber,
      });
      return {
        number: prData.number,
        title: prData.title,
        body: prData.body ?? '',
        author: prData.user?.login ?? 'unknown',
        headRef: prData.head.ref,
        headSha: prData.head.sha,
        isDraft: prData.draft ?? false,
        url: prData.html_url,
      };
    } catch (error) {
      logger.error(
        'Failed to get pull request data:',
        'GitHubClient',
        errorMessage(error),
      );
      throw new FetchError(
        `Could not load pull request ${owner}/${repo}#${pullNumber}: ${errorMessage(error)}`,
        { owner, repo, pullNumber, status: statusOf(error) },
        error,
      );
    }
  }

  async getPullRequestDiff(
    owner: string,
    repo: string,
    pullNumber: number,
  ): Promise<string> {
    let diff: unknown;
    try {
      const response = await this.octokit.rest.pulls.get({
        owner,
        repo,
        pull_number: pullNumber,
        mediaType: { format: 'diff' },
      });
      diff = response.data;
    } catch (error) {
      logger.error(
        'Failed to get pull request diff:',
        'GitHubClient',
        errorMessage(error),
      );
      throw new FetchError(
        `Could not load diff for ${owner}/${repo}#${pullNumber}: ${errorMessage(error)}`,
        { owner, repo, pullNumber, status: statusOf(error) },
        error,
      );
    }

    // the diff media type answers with plain text instead of JSON
    if (typeof diff !== 'string') {
      throw new FetchError(
        `Diff for ${owner}/${repo}#${pullNumber} was not returned as text`,
        { owner, repo, pullNumber },
      );
    }
    return diff;
  }

  async getContentAsText(
    owner: string,
    repo: string,
    path: string,
    ref?: string,
  ): Promise<string | null> {
    try {
      const { data: content } = await this.octokit.rest.repos.getContent({
        owner,
        repo,
        path,
        ref,
      });

      if (Array.isArray(content) || !('content' in content) || !content.content) {
        return null;
      }

      return Buffer.from(content.content, 'base64').toString('utf-8');
    } catch (error) {
      if (statusOf(error) === 404) {
        logger.debug(`${path} not found`, 'GitHubClient');
      } else {
        logger.warn(
          `Failed to get content of ${path}:`,
          'GitHubClient',
          errorMessage(error),
        );
      }
      return null;
    }
  }

  async createPullRequestComment(
    owner: string,
    repo: string,
    pullNumber: number,
    body: string,
  ): Promise<number> {
    try {
      const { data } = await this.octokit.rest.issues.createComment({
        owner,
        repo,
        issue_number: pullNumber,
        body,
      });
      return data.id;
    } catch (error) {
      logger.error(
        'Failed to create pull request comment:',
        'GitHubClient',
        errorMessage(error),
      );
      throw new PostError(
        `Could not comment on ${owner}/${repo}#${pullNumber}: ${errorMessage(error)}`,
        { owner, repo, pullNumber, status: statusOf(error) },
        error,
      );
    }
  }
}
