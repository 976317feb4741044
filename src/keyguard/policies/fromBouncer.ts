import { isAsleep } from "../signals";
import { NO_TRANSITION, SLEEP_SIGNALS, sleepTarget, transitionTo, type TransitionPolicy } from "./policy";

export const fromBouncerPolicy: TransitionPolicy = {
  from: "BOUNCER",
  signals: [...SLEEP_SIGNALS, "keyguardGoingAway", "biometricAuthenticated", "occluded", "primaryBouncerVisible"],
  decide(values, config) {
    if (isAsleep(values.wakefulness)) return transitionTo(sleepTarget(values), "going to sleep", config);
    if (values.keyguardGoingAway) return transitionTo("GONE", "keyguard going away", config);
    // Unlocking over an occluding app never sets keyguardGoingAway.
    if (values.biometricAuthenticated === true && values.occluded) {
      return transitionTo("GONE", "biometric unlock while occluded", config);
    }
    if (!values.primaryBouncerVisible) {
      return values.occluded
        ? transitionTo("OCCLUDED", "bouncer hidden over app", config)
        : transitionTo("LOCKED", "bouncer hidden", config);
    }
    return NO_TRANSITION;
  },
};
