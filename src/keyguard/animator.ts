import type { AnimationHandle, AnimationListener, TransitionAnimator } from "./types";

export type Interpolator = (fraction: number) => number;

export const LINEAR: Interpolator = (t) => t;

export const FAST_OUT_SLOW_IN: Interpolator = (t) => 1 - (1 - t) * (1 - t);

export type FrameAnimatorOptions = {
  durationMs: number;
  frameIntervalMs?: number;
  interpolator?: Interpolator;
};

function clamp01(v: number) {
  return Math.min(1, Math.max(0, v));
}

/**
 * Animator driven by a fixed frame clock. Progress is derived from the frame
 * count rather than wall time, so a given duration always yields the same
 * sequence of values.
 */
export function createFrameAnimator(options: FrameAnimatorOptions): TransitionAnimator {
  const durationMs = Math.max(0, Number(options.durationMs) || 0);
  const frameIntervalMs = Math.max(1, Number(options.frameIntervalMs) || 16);
  const interpolator = options.interpolator ?? LINEAR;

  return {
    durationMs,
    start(startValue: number, listener: AnimationListener): AnimationHandle {
      const from = clamp01(startValue);
      const effectiveMs = durationMs * (1 - from);
      let frame = 0;
      let done = false;

      const timer = setInterval(() => {
        if (done) return;
        frame += 1;
        const fraction = effectiveMs <= 0 ? 1 : Math.min(1, (frame * frameIntervalMs) / effectiveMs);
        const value = fraction >= 1 ? 1 : clamp01(from + (1 - from) * interpolator(fraction));
        listener.onUpdate(value);
        if (fraction >= 1 && !done) {
          done = true;
          clearInterval(timer);
          listener.onEnd();
        }
      }, frameIntervalMs);

      return {
        cancel() {
          if (done) return;
          done = true;
          clearInterval(timer);
        },
      };
    },
  };
}
