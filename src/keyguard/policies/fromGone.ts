import { isAsleep } from "../signals";
import { NO_TRANSITION, SLEEP_SIGNALS, sleepTarget, transitionTo, type TransitionPolicy } from "./policy";

export const fromGonePolicy: TransitionPolicy = {
  from: "GONE",
  signals: [...SLEEP_SIGNALS, "dreaming", "keyguardGoingAway", "biometricAuthenticated"],
  decide(values, config) {
    if (isAsleep(values.wakefulness)) return transitionTo(sleepTarget(values), "going to sleep", config);
    // Every way back to GONE needs going-away or a fresh biometric success;
    // a dream only takes over once neither unlock is still in effect.
    if (values.dreaming && !values.keyguardGoingAway && values.biometricAuthenticated !== true) {
      return transitionTo("DREAMING", "dream started", config);
    }
    return NO_TRANSITION;
  },
};
