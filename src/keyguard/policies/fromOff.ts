import { isAwake } from "../signals";
import { SLEEP_SIGNALS, sleepTarget, transitionTo, type TransitionPolicy } from "./policy";

// Boot: leave OFF as soon as the power state is known.
export const fromOffPolicy: TransitionPolicy = {
  from: "OFF",
  signals: SLEEP_SIGNALS,
  decide(values, config) {
    if (isAwake(values.wakefulness)) return transitionTo("LOCKED", "boot awake", config);
    return transitionTo(sleepTarget(values), "boot asleep", config);
  },
};
