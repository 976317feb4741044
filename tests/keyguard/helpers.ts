import { TransitionLog } from '../../src/runtime/transitionLog';
import type { KeyguardConfig } from '../../src/runtime/keyguardConfig';
import type { KeyguardTransitionRepository } from '../../src/keyguard/transitionRepository';
import type { TransitionStep } from '../../src/keyguard/types';

// Short durations so fake timer advances stay readable: every transition is
// four 25ms frames, the alternate bouncer guard is 200ms.
export const FAST_CONFIG: Partial<KeyguardConfig> = {
  transitionDurationMs: 100,
  toGoneDurationMs: 100,
  toSleepDurationMs: 100,
  frameIntervalMs: 25,
  alternateBouncerHiddenGuardMs: 200,
};

export function quietLog() {
  return new TransitionLog(500, false);
}

/** Records every step after the replayed one. */
export function recordSteps(repository: KeyguardTransitionRepository) {
  const steps: TransitionStep[] = [];
  let replayed = false;
  repository.steps().subscribe((step) => {
    if (!replayed) {
      replayed = true;
      return;
    }
    steps.push(step);
  });
  return steps;
}

export function describeStep(step: TransitionStep) {
  return `${step.from}->${step.to} ${step.transitionState} ${step.value}`;
}

export function started(steps: TransitionStep[]) {
  return steps.filter((s) => s.transitionState === 'STARTED').map((s) => `${s.from}->${s.to}`);
}
