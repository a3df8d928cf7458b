import { ReviewErrorKind } from '../core/errors';

export type ReviewState =
  | 'Idle'
  | 'Triggered'
  | 'Fetching'
  | 'Requesting'
  | 'Posting'
  | 'Done'
  | 'Failed';

const TRANSITIONS: Record<ReviewState, readonly ReviewState[]> = {
  Idle: ['Triggered'],
  // Failed straight from Triggered only for configuration problems
  Triggered: ['Fetching', 'Failed'],
  // Fetching -> Posting is the empty-diff neutral comment
  Fetching: ['Requesting', 'Posting', 'Failed'],
  Requesting: ['Posting', 'Failed'],
  Posting: ['Done', 'Failed'],
  Done: [],
  Failed: [],
};

export class IllegalTransitionError extends Error {
  constructor(from: ReviewState, to: ReviewState) {
    super(`Illegal review state transition: ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

/** Tracks the lifecycle of one review invocation. */
export class ReviewStateMachine {
  private current: ReviewState = 'Idle';
  private failure?: ReviewErrorKind;
  private readonly trail: ReviewState[] = ['Idle'];

  get state(): ReviewState {
    return this.current;
  }

  get failureKind(): ReviewErrorKind | undefined {
    return this.failure;
  }

  get history(): readonly ReviewState[] {
    return this.trail;
  }

  isTerminal(): boolean {
    return this.current === 'Done' || this.current === 'Failed';
  }

  canTransition(next: ReviewState): boolean {
    return TRANSITIONS[this.current].includes(next);
  }

  transition(next: Exclude<ReviewState, 'Failed'>): void {
    this.move(next);
  }

  fail(kind: ReviewErrorKind): void {
    this.move('Failed');
    this.failure = kind;
  }

  private move(next: ReviewState): void {
    if (!this.canTransition(next)) {
      throw new IllegalTransitionError(this.current, next);
    }
    this.current = next;
    this.trail.push(next);
  }

  toString(): string {
    return this.failure ? `Failed(${this.failure})` : this.current;
  }
}
