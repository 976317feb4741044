// Read-side views over the transition step stream for renderers and other consumers.

import { distinctStream, filterStream, mapStream, type Subscribable } from "./stepStream";
import type { KeyguardState, TransitionStep } from "./types";

export function transitionStepsFromState(steps: Subscribable<TransitionStep>, from: KeyguardState) {
  return filterStream(steps, (step) => step.from === from);
}

export function transitionStepsToState(steps: Subscribable<TransitionStep>, to: KeyguardState) {
  return filterStream(steps, (step) => step.to === to);
}

export function transitionStepsBetween(
  steps: Subscribable<TransitionStep>,
  from: KeyguardState,
  to: KeyguardState,
) {
  return filterStream(steps, (step) => step.from === from && step.to === to);
}

/**
 * How visible `state` is: the step value while entering it, 1 - value while
 * leaving it. A canceled entry reports 0 and a canceled exit reports 1.
 * Steps that do not involve `state` are skipped.
 */
export function transitionValue(steps: Subscribable<TransitionStep>, state: KeyguardState): Subscribable<number> {
  return mapStream(steps, (step) => {
    if (step.to === state) return step.transitionState === "CANCELED" ? 0 : step.value;
    if (step.from === state) return step.transitionState === "CANCELED" ? 1 : 1 - step.value;
    return null;
  });
}

/** Confirmed state after each terminal step. */
export function finishedKeyguardState(steps: Subscribable<TransitionStep>): Subscribable<KeyguardState> {
  return distinctStream(mapStream(steps, (step) => {
    if (step.transitionState === "FINISHED") return step.to;
    if (step.transitionState === "CANCELED") return step.from;
    return null;
  }));
}

/** True while the keyguard sits in `state` with no transition running. */
export function isFinishedInState(steps: Subscribable<TransitionStep>, state: KeyguardState): Subscribable<boolean> {
  return distinctStream(mapStream(steps, (step) => {
    if (step.transitionState === "FINISHED") return step.to === state;
    if (step.transitionState === "CANCELED") return step.from === state;
    return false;
  }));
}
