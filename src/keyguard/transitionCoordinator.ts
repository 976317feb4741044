import { KEYGUARD_CONFIG, type KeyguardConfig } from "../runtime/keyguardConfig";
import { TransitionLog } from "../runtime/transitionLog";
import { TRANSITION_POLICIES, type TransitionPolicy } from "./policies";
import { createKeyguardSignals, type KeyguardSignalValues, type KeyguardSignals } from "./signals";
import type { Unsubscribe } from "./stepStream";
import { FromStateTransitionInteractor, type InteractorConfig } from "./transitionInteractor";
import { KeyguardTransitionRepository } from "./transitionRepository";
import type { KeyguardState } from "./types";

export type KeyguardTransitionCoordinatorDeps = {
  repository: KeyguardTransitionRepository;
  signals: KeyguardSignals;
  config?: Partial<InteractorConfig>;
  policies?: Readonly<Record<KeyguardState, TransitionPolicy>>;
};

/**
 * Owns one interactor per keyguard state and keeps exactly the one bound to
 * the repository's active state listening.
 */
export class KeyguardTransitionCoordinator {
  private readonly _interactors: Readonly<Record<KeyguardState, FromStateTransitionInteractor>>;
  private _activeTag: KeyguardState | null = null;
  private _unsubscribe: Unsubscribe | null = null;

  constructor(private readonly deps: KeyguardTransitionCoordinatorDeps) {
    const config: InteractorConfig = { ...KEYGUARD_CONFIG, ...deps.config };
    const policies = deps.policies ?? TRANSITION_POLICIES;
    const build = (state: KeyguardState) =>
      new FromStateTransitionInteractor({
        policy: policies[state],
        repository: deps.repository,
        signals: deps.signals,
        config,
      });
    this._interactors = {
      OFF: build("OFF"),
      AOD: build("AOD"),
      DOZING: build("DOZING"),
      DREAMING: build("DREAMING"),
      LOCKED: build("LOCKED"),
      BOUNCER: build("BOUNCER"),
      ALTERNATE_BOUNCER: build("ALTERNATE_BOUNCER"),
      OCCLUDED: build("OCCLUDED"),
      GONE: build("GONE"),
    };
  }

  get running(): boolean {
    return this._unsubscribe !== null;
  }

  start(): void {
    if (this._unsubscribe) return;
    this._unsubscribe = this.deps.repository.steps().subscribe(() => this._sync());
  }

  stop(): void {
    this._unsubscribe?.();
    this._unsubscribe = null;
    if (this._activeTag) this._interactors[this._activeTag].deactivate();
    this._activeTag = null;
  }

  activeInteractor(): KeyguardState | null {
    return this._activeTag;
  }

  interactor(state: KeyguardState): FromStateTransitionInteractor {
    return this._interactors[state];
  }

  private _sync(): void {
    const target = this.deps.repository.activeState();
    if (target === this._activeTag) return;
    const previous = this._activeTag;
    this._activeTag = target;
    if (previous) this._interactors[previous].deactivate();
    this._interactors[target].activate();
  }
}

export type KeyguardTransitionCore = {
  repository: KeyguardTransitionRepository;
  signals: KeyguardSignals;
  coordinator: KeyguardTransitionCoordinator;
};

export type KeyguardTransitionCoreOptions = {
  config?: Partial<KeyguardConfig>;
  initialState?: KeyguardState;
  initialSignals?: Partial<KeyguardSignalValues>;
  log?: TransitionLog;
  autoStart?: boolean;
};

/** Wires a repository, a fresh signal bundle and a coordinator together. */
export function createKeyguardTransitionCore(options: KeyguardTransitionCoreOptions = {}): KeyguardTransitionCore {
  const config: KeyguardConfig = { ...KEYGUARD_CONFIG, ...options.config };
  const repository = new KeyguardTransitionRepository({
    initialState: options.initialState ?? config.initialState,
    log: options.log ?? new TransitionLog(config.logBufferSize, config.logEnabled),
  });
  const signals = createKeyguardSignals(options.initialSignals);
  const coordinator = new KeyguardTransitionCoordinator({ repository, signals, config });
  if (options.autoStart !== false) coordinator.start();
  return { repository, signals, coordinator };
}
