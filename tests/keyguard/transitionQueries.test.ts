import { describe, expect, it } from 'vitest';
import {
  finishedKeyguardState,
  isFinishedInState,
  transitionStepsBetween,
  transitionStepsFromState,
  transitionStepsToState,
  transitionValue,
} from '../../src/keyguard/transitionQueries';
import { KeyguardTransitionRepository } from '../../src/keyguard/transitionRepository';
import type { KeyguardState } from '../../src/keyguard/types';
import { quietLog } from './helpers';

function collect<T>(source: { subscribe(listener: (value: T) => void): unknown }) {
  const values: T[] = [];
  source.subscribe((v) => values.push(v));
  return values;
}

// LOCKED → BOUNCER (finished), BOUNCER → LOCKED (canceled), BOUNCER → LOCKED (finished).
function playBouncerRoundTrip(repository: KeyguardTransitionRepository) {
  const manual = (from: KeyguardState, to: KeyguardState) =>
    repository.startTransition({ ownerName: 'swipe', from, to, animator: null });

  const open = manual('LOCKED', 'BOUNCER');
  repository.updateTransition(open, 0.4, 'RUNNING');
  repository.updateTransition(open, 1, 'FINISHED');

  const abandoned = manual('BOUNCER', 'LOCKED');
  repository.updateTransition(abandoned, 0.25, 'RUNNING');
  repository.updateTransition(abandoned, 0.25, 'CANCELED');

  const close = manual('BOUNCER', 'LOCKED');
  repository.updateTransition(close, 1, 'FINISHED');
}

describe('transition queries', () => {
  it('reports how visible a state is while entering and leaving it', () => {
    const repository = new KeyguardTransitionRepository({ initialState: 'LOCKED', log: quietLog() });
    const visibility = collect(transitionValue(repository.steps(), 'BOUNCER'));
    playBouncerRoundTrip(repository);
    expect(visibility).toEqual([0, 0.4, 1, 1, 0.75, 1, 1, 0]);
  });

  it('reports each settled state once', () => {
    const repository = new KeyguardTransitionRepository({ initialState: 'LOCKED', log: quietLog() });
    const settled = collect(finishedKeyguardState(repository.steps()));
    const lockedIdle = collect(isFinishedInState(repository.steps(), 'LOCKED'));
    playBouncerRoundTrip(repository);
    expect(settled).toEqual(['LOCKED', 'BOUNCER', 'LOCKED']);
    expect(lockedIdle).toEqual([true, false, true]);
  });

  it('filters by endpoint', () => {
    const repository = new KeyguardTransitionRepository({ initialState: 'LOCKED', log: quietLog() });
    const fromBouncer = collect(transitionStepsFromState(repository.steps(), 'BOUNCER'));
    const toLocked = collect(transitionStepsToState(repository.steps(), 'LOCKED'));
    const lockedToBouncer = collect(transitionStepsBetween(repository.steps(), 'LOCKED', 'BOUNCER'));
    playBouncerRoundTrip(repository);

    expect(fromBouncer.map((s) => s.transitionId)).toEqual([2, 2, 2, 3, 3]);
    expect(toLocked.map((s) => s.transitionId)).toEqual([0, 2, 2, 2, 3, 3]);
    expect(lockedToBouncer.map((s) => s.transitionState)).toEqual(['STARTED', 'RUNNING', 'FINISHED']);
  });
});
