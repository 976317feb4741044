import { isAsleep } from "../signals";
import { NO_TRANSITION, SLEEP_SIGNALS, sleepTarget, transitionTo, type TransitionPolicy } from "./policy";

export const fromLockedPolicy: TransitionPolicy = {
  from: "LOCKED",
  signals: [
    ...SLEEP_SIGNALS,
    "keyguardGoingAway",
    "occluded",
    "dreaming",
    "primaryBouncerVisible",
    "alternateBouncerVisible",
  ],
  decide(values, config) {
    if (isAsleep(values.wakefulness)) return transitionTo(sleepTarget(values), "going to sleep", config);
    if (values.keyguardGoingAway) return transitionTo("GONE", "keyguard going away", config);
    if (values.occluded) return transitionTo("OCCLUDED", "occluded", config);
    if (values.dreaming) return transitionTo("DREAMING", "dream started", config);
    if (values.primaryBouncerVisible) return transitionTo("BOUNCER", "primary bouncer shown", config);
    if (values.alternateBouncerVisible) return transitionTo("ALTERNATE_BOUNCER", "alternate bouncer shown", config);
    return NO_TRANSITION;
  },
};
