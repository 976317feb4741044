import { useEffect, useMemo, useState } from "react";
import type { KeyguardTransitionRepository } from "../../../keyguard/transitionRepository";
import { isInFlight, type KeyguardState, type TransitionStep } from "../../../keyguard/types";

export type KeyguardTransitionView = {
  /** Confirmed state; the origin while a transition runs. */
  currentState: KeyguardState;
  /** State being shown or entered. */
  activeState: KeyguardState;
  inTransition: boolean;
  progress: number;
  from: KeyguardState;
  to: KeyguardState;
  ownerName: string;
};

export function deriveKeyguardTransitionView(step: TransitionStep): KeyguardTransitionView {
  const canceled = step.transitionState === "CANCELED";
  return {
    currentState: step.transitionState === "FINISHED" ? step.to : step.from,
    activeState: canceled ? step.from : step.to,
    inTransition: isInFlight(step),
    progress: step.value,
    from: step.from,
    to: step.to,
    ownerName: step.ownerName,
  };
}

export function useKeyguardTransition(repository: KeyguardTransitionRepository) {
  const [step, setStep] = useState<TransitionStep>(() => repository.latestStep());

  useEffect(() => repository.steps().subscribe(setStep), [repository]);

  return useMemo(() => deriveKeyguardTransitionView(step), [step]);
}
