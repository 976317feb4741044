import { configError } from "../runtime/errorTaxonomy";
import { LINEAR, type Interpolator } from "./animator";
import { mapStream, type Subscribable } from "./stepStream";
import { transitionStepsBetween } from "./transitionQueries";
import type { KeyguardState, TransitionStep } from "./types";

export type TransitionAnimationSpec = {
  from: KeyguardState;
  to: KeyguardState;
  /** Full duration of the from→to transition. */
  durationMs: number;
};

export type SharedFlowOptions = {
  /** Length of the sub-window within the transition. */
  durationMs: number;
  startTimeMs?: number;
  onStep: (fraction: number) => number;
  onStart?: () => number | null;
  onFinish?: () => number | null;
  onCancel?: () => number | null;
  interpolator?: Interpolator;
};

export interface TransitionAnimation {
  sharedFlow(options: SharedFlowOptions): Subscribable<number>;
}

/**
 * Breaks one transition into sub-windows so separate pieces of UI can animate
 * over different portions of it.
 */
export function createTransitionAnimation(
  steps: Subscribable<TransitionStep>,
  spec: TransitionAnimationSpec,
): TransitionAnimation {
  if (!(spec.durationMs > 0)) {
    throw configError(`transition animation ${spec.from}→${spec.to} needs a positive duration`, { ...spec });
  }
  const transitionSteps = transitionStepsBetween(steps, spec.from, spec.to);

  return {
    sharedFlow(options) {
      const startTimeMs = options.startTimeMs ?? 0;
      if (!(options.durationMs > 0) || startTimeMs < 0 || startTimeMs + options.durationMs > spec.durationMs) {
        throw configError(
          `window ${startTimeMs}+${options.durationMs}ms does not fit ${spec.from}→${spec.to} (${spec.durationMs}ms)`,
          { startTimeMs, durationMs: options.durationMs, transitionDurationMs: spec.durationMs },
        );
      }
      const start = startTimeMs / spec.durationMs;
      const chunks = spec.durationMs / options.durationMs;
      const interpolator = options.interpolator ?? LINEAR;

      const windowed = (value: number) => {
        const fraction = (value - start) * chunks;
        if (fraction < 0 || fraction > 1) return null;
        return options.onStep(interpolator(fraction));
      };

      return mapStream(transitionSteps, (step) => {
        switch (step.transitionState) {
          case "STARTED":
            return options.onStart ? options.onStart() : windowed(step.value);
          case "RUNNING":
            return windowed(step.value);
          case "FINISHED":
            return options.onFinish ? options.onFinish() : options.onStep(1);
          case "CANCELED":
            return options.onCancel ? options.onCancel() : null;
        }
      });
    },
  };
}
