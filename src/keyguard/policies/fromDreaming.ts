import { isAsleep } from "../signals";
import { NO_TRANSITION, SLEEP_SIGNALS, sleepTarget, transitionTo, type TransitionPolicy } from "./policy";

export const fromDreamingPolicy: TransitionPolicy = {
  from: "DREAMING",
  signals: [
    ...SLEEP_SIGNALS,
    "keyguardGoingAway",
    "primaryBouncerVisible",
    "alternateBouncerVisible",
    "dreaming",
    "occluded",
  ],
  decide(values, config) {
    if (isAsleep(values.wakefulness)) return transitionTo(sleepTarget(values), "going to sleep", config);
    if (values.keyguardGoingAway) return transitionTo("GONE", "dream dismissed", config);
    if (values.primaryBouncerVisible) return transitionTo("BOUNCER", "primary bouncer shown", config);
    if (values.alternateBouncerVisible) return transitionTo("ALTERNATE_BOUNCER", "alternate bouncer shown", config);
    if (!values.dreaming) {
      return values.occluded
        ? transitionTo("OCCLUDED", "dream ended over app", config)
        : transitionTo("LOCKED", "dream ended", config);
    }
    return NO_TRANSITION;
  },
};
