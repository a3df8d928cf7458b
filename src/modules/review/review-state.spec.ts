import { IllegalTransitionError, ReviewStateMachine } from './review-state';

describe('ReviewStateMachine', () => {
  it('should walk the happy path to Done', () => {
    const machine = new ReviewStateMachine();

    machine.transition('Triggered');
    machine.transition('Fetching');
    machine.transition('Requesting');
    machine.transition('Posting');
    machine.transition('Done');

    expect(machine.state).toBe('Done');
    expect(machine.isTerminal()).toBe(true);
    expect(machine.history).toEqual([
      'Idle',
      'Triggered',
      'Fetching',
      'Requesting',
      'Posting',
      'Done',
    ]);
    expect(machine.toString()).toBe('Done');
  });

  it('should allow posting straight after fetching an empty diff', () => {
    const machine = new ReviewStateMachine();
    machine.transition('Triggered');
    machine.transition('Fetching');

    expect(machine.canTransition('Posting')).toBe(true);
    machine.transition('Posting');
    expect(machine.state).toBe('Posting');
  });

  it('should record the failure kind', () => {
    const machine = new ReviewStateMachine();
    machine.transition('Triggered');
    machine.transition('Fetching');
    machine.transition('Requesting');

    machine.fail('UpstreamError');

    expect(machine.state).toBe('Failed');
    expect(machine.failureKind).toBe('UpstreamError');
    expect(machine.toString()).toBe('Failed(UpstreamError)');
  });

  it('should reject skipping states', () => {
    const machine = new ReviewStateMachine();
    machine.transition('Triggered');

    expect(() => machine.transition('Requesting')).toThrow(IllegalTransitionError);
    expect(() => machine.transition('Requesting')).toThrow(
      'Illegal review state transition: Triggered -> Requesting',
    );
  });

  it('should not leave a terminal state', () => {
    const machine = new ReviewStateMachine();
    machine.transition('Triggered');
    machine.fail('ConfigurationError');

    expect(machine.isTerminal()).toBe(true);
    expect(() => machine.transition('Fetching')).toThrow(IllegalTransitionError);
    expect(() => machine.fail('PostError')).toThrow(IllegalTransitionError);
  });

  it('should not fail before being triggered', () => {
    expect(() => new ReviewStateMachine().fail('UpstreamError')).toThrow(IllegalTransitionError);
  });
});
