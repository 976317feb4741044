// Signal sources the keyguard reacts to but does not own.
// Each source is one current value plus change notifications; sources carry no
// ordering guarantee relative to each other.

import type { Unsubscribe } from "./stepStream";

export type SignalListener<T> = (value: T) => void;

export interface ReadonlySignal<T> {
  readonly value: T;
  /** Listener runs on every change, not on subscription. */
  subscribe(listener: SignalListener<T>): Unsubscribe;
}

export class MutableSignal<T> implements ReadonlySignal<T> {
  private _value: T;
  private _listeners: Set<SignalListener<T>> = new Set();

  constructor(initial: T) {
    this._value = initial;
  }

  get value(): T {
    return this._value;
  }

  set(next: T): void {
    if (Object.is(next, this._value)) return;
    this._value = next;
    for (const fn of Array.from(this._listeners)) {
      if (this._listeners.has(fn)) fn(next);
    }
  }

  subscribe(listener: SignalListener<T>): Unsubscribe {
    this._listeners.add(listener);
    return () => {
      this._listeners.delete(listener);
    };
  }

  get listenerCount(): number {
    return this._listeners.size;
  }
}

export type WakefulnessState = "ASLEEP" | "STARTING_TO_WAKE" | "AWAKE" | "STARTING_TO_SLEEP";

export type WakeSleepReason = "POWER_BUTTON" | "TAP" | "GESTURE" | "LIFT" | "BIOMETRIC" | "TIMEOUT" | "OTHER";

export interface WakefulnessModel {
  readonly state: WakefulnessState;
  readonly lastWakeReason: WakeSleepReason;
  readonly lastSleepReason: WakeSleepReason;
}

export function isAsleep(model: WakefulnessModel) {
  return model.state === "ASLEEP" || model.state === "STARTING_TO_SLEEP";
}

export function isAwake(model: WakefulnessModel) {
  return model.state === "AWAKE" || model.state === "STARTING_TO_WAKE";
}

export type KeyguardSignalValues = {
  wakefulness: WakefulnessModel;
  occluded: boolean;
  /** true: just confirmed, false: rejected, null: reset. */
  biometricAuthenticated: boolean | null;
  primaryBouncerVisible: boolean;
  alternateBouncerVisible: boolean;
  dreaming: boolean;
  keyguardGoingAway: boolean;
  aodAvailable: boolean;
};

export type KeyguardSignalName = keyof KeyguardSignalValues;

export type KeyguardSignals = {
  [K in KeyguardSignalName]: MutableSignal<KeyguardSignalValues[K]>;
};

export const AWAKE: WakefulnessModel = Object.freeze({
  state: "AWAKE",
  lastWakeReason: "OTHER",
  lastSleepReason: "OTHER",
});

export const DEFAULT_SIGNAL_VALUES: Readonly<KeyguardSignalValues> = Object.freeze({
  wakefulness: AWAKE,
  occluded: false,
  biometricAuthenticated: null,
  primaryBouncerVisible: false,
  alternateBouncerVisible: false,
  dreaming: false,
  keyguardGoingAway: false,
  aodAvailable: false,
});

export function createKeyguardSignals(initial: Partial<KeyguardSignalValues> = {}): KeyguardSignals {
  const v: KeyguardSignalValues = { ...DEFAULT_SIGNAL_VALUES, ...initial };
  return {
    wakefulness: new MutableSignal(v.wakefulness),
    occluded: new MutableSignal(v.occluded),
    biometricAuthenticated: new MutableSignal(v.biometricAuthenticated),
    primaryBouncerVisible: new MutableSignal(v.primaryBouncerVisible),
    alternateBouncerVisible: new MutableSignal(v.alternateBouncerVisible),
    dreaming: new MutableSignal(v.dreaming),
    keyguardGoingAway: new MutableSignal(v.keyguardGoingAway),
    aodAvailable: new MutableSignal(v.aodAvailable),
  };
}

export function snapshotSignals(signals: KeyguardSignals): KeyguardSignalValues {
  return {
    wakefulness: signals.wakefulness.value,
    occluded: signals.occluded.value,
    biometricAuthenticated: signals.biometricAuthenticated.value,
    primaryBouncerVisible: signals.primaryBouncerVisible.value,
    alternateBouncerVisible: signals.alternateBouncerVisible.value,
    dreaming: signals.dreaming.value,
    keyguardGoingAway: signals.keyguardGoingAway.value,
    aodAvailable: signals.aodAvailable.value,
  };
}

/** Convenience for drivers and tests updating the power signal. */
export function setWakefulness(
  signals: KeyguardSignals,
  state: WakefulnessState,
  reason: WakeSleepReason = "POWER_BUTTON",
): void {
  const prev = signals.wakefulness.value;
  const waking = state === "AWAKE" || state === "STARTING_TO_WAKE";
  signals.wakefulness.set({
    state,
    lastWakeReason: waking ? reason : prev.lastWakeReason,
    lastSleepReason: waking ? prev.lastSleepReason : reason,
  });
}
