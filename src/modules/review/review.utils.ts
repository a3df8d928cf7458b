import { IssueCommentEventDto } from '../webhook/dto/webhook.dto';
import { ReviewRequest, ReviewResult } from './review.types';

export const TRIGGER_EVENT = 'issue_comment';

export type TriggerDecision =
  | { trigger: true; request: ReviewRequest }
  | { trigger: false; reason: string };

/** Case-sensitive literal match of the trigger phrase. */
export function containsTriggerPhrase(body: string, phrase: string): boolean {
  return phrase.length > 0 && body.includes(phrase);
}

export function isBotAccount(user: { login: string; type?: string }): boolean {
  return user.type === 'Bot' || user.login.endsWith('[bot]');
}

/**
 * Decides whether a validated `issue_comment` event asks for a review.
 */
export function shouldTriggerReview(
  event: IssueCommentEventDto,
  triggerPhrase: string,
): TriggerDecision {
  if (event.action !== 'created') {
    return { trigger: false, reason: `comment ${event.action}` };
  }
  if (!event.issue.pull_request) {
    return { trigger: false, reason: 'comment is not on a pull request' };
  }
  if (isBotAccount(event.comment.user)) {
    return { trigger: false, reason: 'comment written by a bot' };
  }
  if (!containsTriggerPhrase(event.comment.body, triggerPhrase)) {
    return { trigger: false, reason: 'trigger phrase not present' };
  }
  return {
    trigger: true,
    request: {
      owner: event.repository.owner.login,
      repo: event.repository.name,
      pullNumber: event.issue.number,
      requestedBy: event.comment.user.login,
      triggerPhrase,
      triggerCommentId: event.comment.id,
    },
  };
}

/** Process exit status for the CI job. */
export function exitCodeFor(result: ReviewResult | null): number {
  if (!result) {
    return 0;
  }
  return result.success ? 0 : 1;
}
