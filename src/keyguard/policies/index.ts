import type { KeyguardState } from "../types";
import { fromAlternateBouncerPolicy } from "./fromAlternateBouncer";
import { fromAodPolicy } from "./fromAod";
import { fromBouncerPolicy } from "./fromBouncer";
import { fromDozingPolicy } from "./fromDozing";
import { fromDreamingPolicy } from "./fromDreaming";
import { fromGonePolicy } from "./fromGone";
import { fromLockedPolicy } from "./fromLocked";
import { fromOccludedPolicy } from "./fromOccluded";
import { fromOffPolicy } from "./fromOff";
import type { TransitionPolicy } from "./policy";

export * from "./policy";

// One policy per state; the record type keeps the set closed.
export const TRANSITION_POLICIES: Readonly<Record<KeyguardState, TransitionPolicy>> = {
  OFF: fromOffPolicy,
  AOD: fromAodPolicy,
  DOZING: fromDozingPolicy,
  DREAMING: fromDreamingPolicy,
  LOCKED: fromLockedPolicy,
  BOUNCER: fromBouncerPolicy,
  ALTERNATE_BOUNCER: fromAlternateBouncerPolicy,
  OCCLUDED: fromOccludedPolicy,
  GONE: fromGonePolicy,
};

export {
  fromAlternateBouncerPolicy,
  fromAodPolicy,
  fromBouncerPolicy,
  fromDozingPolicy,
  fromDreamingPolicy,
  fromGonePolicy,
  fromLockedPolicy,
  fromOccludedPolicy,
  fromOffPolicy,
};
