import type { KeyguardConfig } from "../../runtime/keyguardConfig";
import type { KeyguardSignalName, KeyguardSignalValues } from "../signals";
import type { KeyguardState } from "../types";

export type TransitionDecision =
  | { kind: "none" }
  | {
      kind: "transition";
      to: KeyguardState;
      durationMs: number;
      /** Decision must hold this long before it is acted on. */
      guardMs?: number;
      reason: string;
    };

export type PolicyConfig = Pick<
  KeyguardConfig,
  "transitionDurationMs" | "toGoneDurationMs" | "toSleepDurationMs" | "alternateBouncerHiddenGuardMs"
>;

/**
 * Transition-out rules for one source state. `decide` is a pure function of
 * the latest signal values; rules are checked top-down, first match wins.
 */
export interface TransitionPolicy {
  readonly from: KeyguardState;
  readonly signals: ReadonlyArray<KeyguardSignalName>;
  decide(values: KeyguardSignalValues, config: PolicyConfig): TransitionDecision;
}

export const NO_TRANSITION: TransitionDecision = Object.freeze({ kind: "none" });

export function durationFor(to: KeyguardState, config: PolicyConfig) {
  if (to === "GONE") return config.toGoneDurationMs;
  if (to === "AOD" || to === "DOZING") return config.toSleepDurationMs;
  return config.transitionDurationMs;
}

export function transitionTo(
  to: KeyguardState,
  reason: string,
  config: PolicyConfig,
  guardMs?: number,
): TransitionDecision {
  return guardMs === undefined
    ? { kind: "transition", to, durationMs: durationFor(to, config), reason }
    : { kind: "transition", to, durationMs: durationFor(to, config), guardMs, reason };
}

export function sleepTarget(values: KeyguardSignalValues): KeyguardState {
  return values.aodAvailable ? "AOD" : "DOZING";
}

/** Signals every awake-keyguard policy needs to react to power-off. */
export const SLEEP_SIGNALS: ReadonlyArray<KeyguardSignalName> = ["wakefulness", "aodAvailable"];
