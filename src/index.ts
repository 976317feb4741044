export * from "./keyguard/types";
export * from "./keyguard/signals";
export * from "./keyguard/stepStream";
export * from "./keyguard/animator";
export * from "./keyguard/pendingAction";
export * from "./keyguard/policies";
export * from "./keyguard/transitionRepository";
export * from "./keyguard/transitionInteractor";
export * from "./keyguard/transitionCoordinator";
export * from "./keyguard/transitionQueries";
export * from "./keyguard/transitionAnimation";
export * from "./runtime/errorTaxonomy";
export * from "./runtime/keyguardConfig";
export * from "./runtime/transitionLog";
export * from "./components/keyguard/hooks/useKeyguardTransition";
