import { isAsleep } from "../signals";
import { NO_TRANSITION, SLEEP_SIGNALS, sleepTarget, transitionTo, type TransitionPolicy } from "./policy";

export const fromOccludedPolicy: TransitionPolicy = {
  from: "OCCLUDED",
  signals: [
    ...SLEEP_SIGNALS,
    "keyguardGoingAway",
    "primaryBouncerVisible",
    "alternateBouncerVisible",
    "occluded",
    "dreaming",
  ],
  decide(values, config) {
    if (isAsleep(values.wakefulness)) return transitionTo(sleepTarget(values), "going to sleep", config);
    if (values.keyguardGoingAway) return transitionTo("GONE", "keyguard going away", config);
    if (values.primaryBouncerVisible) return transitionTo("BOUNCER", "primary bouncer shown", config);
    if (values.alternateBouncerVisible) return transitionTo("ALTERNATE_BOUNCER", "alternate bouncer shown", config);
    if (!values.occluded) {
      return values.dreaming
        ? transitionTo("DREAMING", "unoccluded into dream", config)
        : transitionTo("LOCKED", "unoccluded", config);
    }
    return NO_TRANSITION;
  },
};
