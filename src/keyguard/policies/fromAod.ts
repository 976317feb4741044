import { isAwake } from "../signals";
import { NO_TRANSITION, transitionTo, type TransitionPolicy } from "./policy";

export const fromAodPolicy: TransitionPolicy = {
  from: "AOD",
  signals: ["wakefulness", "aodAvailable", "occluded", "keyguardGoingAway"],
  decide(values, config) {
    if (isAwake(values.wakefulness)) {
      if (values.keyguardGoingAway) return transitionTo("GONE", "wake and unlock", config);
      if (values.occluded) return transitionTo("OCCLUDED", "woke into occluding app", config);
      return transitionTo("LOCKED", "woke up", config);
    }
    if (!values.aodAvailable) return transitionTo("DOZING", "aod disabled", config);
    return NO_TRANSITION;
  },
};
