import { ReviewErrorKind } from '../core/errors';
import { ReviewState } from './review-state';

/** One trigger, consumed within a single invocation. */
export interface ReviewRequest {
  owner: string;
  repo: string;
  pullNumber: number;
  /** Login of whoever wrote the triggering comment. */
  requestedBy: string;
  /** The phrase that matched, absent for manual runs. */
  triggerPhrase?: string;
  triggerCommentId?: number;
}

export type ReviewOutcome = 'reviewed' | 'empty-diff' | 'failed';

export interface TruncationSummary {
  truncated: boolean;
  originalChars: number;
  finalChars: number;
  omittedHunks: number;
  excludedFiles: string[];
}

export interface ReviewResult {
  success: boolean;
  outcome: ReviewOutcome;
  /** Text of the comment that was posted. Empty when none was. */
  body: string;
  commentId?: number;
  error?: {
    kind: ReviewErrorKind;
    message: string;
  };
  state: ReviewState;
  attempts: number;
  truncation?: TruncationSummary;
}
