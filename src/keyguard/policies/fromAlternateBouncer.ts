import { isAsleep, isAwake } from "../signals";
import { NO_TRANSITION, SLEEP_SIGNALS, sleepTarget, transitionTo, type TransitionPolicy } from "./policy";

export const fromAlternateBouncerPolicy: TransitionPolicy = {
  from: "ALTERNATE_BOUNCER",
  signals: [
    ...SLEEP_SIGNALS,
    "keyguardGoingAway",
    "biometricAuthenticated",
    "occluded",
    "primaryBouncerVisible",
    "alternateBouncerVisible",
  ],
  decide(values, config) {
    if (isAsleep(values.wakefulness)) return transitionTo(sleepTarget(values), "going to sleep", config);
    if (values.keyguardGoingAway) return transitionTo("GONE", "keyguard going away", config);
    if (values.biometricAuthenticated === true && values.occluded) {
      return transitionTo("GONE", "biometric unlock while occluded", config);
    }
    if (values.primaryBouncerVisible) return transitionTo("BOUNCER", "primary bouncer shown", config);
    // The alternate bouncer hides briefly while the primary one takes over;
    // only a hide that sticks returns to the lockscreen.
    if (!values.alternateBouncerVisible && isAwake(values.wakefulness)) {
      const guardMs = config.alternateBouncerHiddenGuardMs;
      return values.occluded
        ? transitionTo("OCCLUDED", "alternate bouncer hidden over app", config, guardMs)
        : transitionTo("LOCKED", "alternate bouncer hidden", config, guardMs);
    }
    return NO_TRANSITION;
  },
};
