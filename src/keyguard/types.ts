// Keyguard transition model.
// Exactly one KeyguardState is confirmed at any instant; every change goes through a
// TransitionStep sequence emitted by the transition repository.

export const KEYGUARD_STATES = [
  "OFF",               // Boot state; display has never shown the keyguard
  "AOD",               // Always-on display while asleep
  "DOZING",            // Asleep without AOD
  "DREAMING",          // Screensaver over the keyguard
  "LOCKED",            // Lockscreen idle
  "BOUNCER",           // Primary (credential) bouncer
  "ALTERNATE_BOUNCER", // Biometric-only bouncer
  "OCCLUDED",          // An app is shown over the keyguard
  "GONE",              // Keyguard dismissed
] as const;

export type KeyguardState = (typeof KEYGUARD_STATES)[number];

export function isKeyguardState(value: unknown): value is KeyguardState {
  return typeof value === "string" && KEYGUARD_STATES.some((state) => state === value);
}

export type TransitionState = "STARTED" | "RUNNING" | "FINISHED" | "CANCELED";

export type TransitionId = number;

export interface TransitionStep {
  readonly transitionId: TransitionId;
  readonly from: KeyguardState;
  readonly to: KeyguardState;
  /** Progress in [0, 1]. */
  readonly value: number;
  readonly transitionState: TransitionState;
  readonly ownerName: string;
}

/**
 * Where a transition starts when it supersedes one already in flight.
 * RESET starts at 0, LAST_VALUE continues from the canceled value and
 * REVERSE mirrors it (1 - value).
 */
export type TransitionModeOnCanceled = "RESET" | "LAST_VALUE" | "REVERSE";

export interface AnimationListener {
  onUpdate(value: number): void;
  onEnd(): void;
}

export interface AnimationHandle {
  cancel(): void;
}

export interface TransitionAnimator {
  readonly durationMs: number;
  start(startValue: number, listener: AnimationListener): AnimationHandle;
}

export interface TransitionInfo {
  ownerName: string;
  from: KeyguardState;
  to: KeyguardState;
  /** null: manual transition, progress is reported through updateTransition. */
  animator: TransitionAnimator | null;
  modeOnCanceled?: TransitionModeOnCanceled;
  /**
   * Delay the requester already waited out before asking. Only recorded in the
   * transition log; the repository starts the transition immediately.
   */
  guardDelayMs?: number;
}

export type KeyguardHint = "primaryBouncerHintShown" | "alternateBouncerHintShown";

export type KeyguardHints = Readonly<Record<KeyguardHint, boolean>>;

export const DEFAULT_HINTS: KeyguardHints = Object.freeze({
  primaryBouncerHintShown: false,
  alternateBouncerHintShown: false,
});

export function isInFlight(step: TransitionStep): boolean {
  return step.transitionState === "STARTED" || step.transitionState === "RUNNING";
}
