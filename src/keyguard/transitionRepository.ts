// Keyguard transition repository.
// Sole owner of the confirmed keyguard state and the transition in flight.
// Every mutation happens inside one synchronous call; the resulting steps are
// delivered through a single ordered queue, so "check origin, then start" is
// atomic even when a step listener calls straight back in.

import {
  StaleOriginError,
  formatKeyguardError,
  transitionError,
} from "../runtime/errorTaxonomy";
import { KEYGUARD_CONFIG } from "../runtime/keyguardConfig";
import { TransitionLog } from "../runtime/transitionLog";
import { ReplayStream, type Subscribable } from "./stepStream";
import {
  DEFAULT_HINTS,
  type AnimationHandle,
  type KeyguardHint,
  type KeyguardHints,
  type KeyguardState,
  type TransitionId,
  type TransitionInfo,
  type TransitionModeOnCanceled,
  type TransitionState,
  type TransitionStep,
} from "./types";

type ActiveTransition = {
  id: TransitionId;
  from: KeyguardState;
  to: KeyguardState;
  ownerName: string;
  manual: boolean;
  value: number;
  lastStep: TransitionStep;
  handle: AnimationHandle | null;
};

export type KeyguardTransitionRepositoryOptions = {
  initialState?: KeyguardState;
  log?: TransitionLog;
};

export const BOOT_OWNER = "boot";

function startingValue(mode: TransitionModeOnCanceled, canceledValue: number) {
  if (mode === "LAST_VALUE") return canceledValue;
  if (mode === "REVERSE") return 1 - canceledValue;
  return 0;
}

export class KeyguardTransitionRepository {
  readonly log: TransitionLog;
  private _confirmed: KeyguardState;
  private _active: ActiveTransition | null = null;
  private _nextId: TransitionId = 1;
  private _hints: KeyguardHints = DEFAULT_HINTS;
  private _lastEmitted: TransitionStep;
  private readonly _steps: ReplayStream<TransitionStep>;

  constructor(options: KeyguardTransitionRepositoryOptions = {}) {
    this.log = options.log ?? new TransitionLog(KEYGUARD_CONFIG.logBufferSize, KEYGUARD_CONFIG.logEnabled);
    this._confirmed = options.initialState ?? "OFF";
    this._lastEmitted = Object.freeze({
      transitionId: 0,
      from: "OFF",
      to: this._confirmed,
      value: 1,
      transitionState: "FINISHED",
      ownerName: BOOT_OWNER,
    });
    this._steps = new ReplayStream(this._lastEmitted, (err) => {
      const message = `step listener failed: ${formatKeyguardError(err)}`;
      console.error(`[keyguard] ${message}`);
      this.log.record("ignored", message);
    });
  }

  /**
   * Start a transition, superseding whatever is in flight.
   * Throws StaleOriginError when info.from is neither the confirmed state nor
   * the destination of the transition in flight; nothing is emitted then.
   */
  startTransition(info: TransitionInfo): TransitionId {
    if (info.from === info.to) {
      throw transitionError(
        `${info.ownerName} requested a transition from ${info.from} to itself`,
        { from: info.from, ownerName: info.ownerName },
        "TRANSITION_INVALID_REQUEST",
      );
    }

    const inFlight = this._active;
    const originOk = inFlight
      ? info.from === inFlight.to || info.from === this._confirmed
      : info.from === this._confirmed;
    if (!originOk) {
      const err = new StaleOriginError({
        ownerName: info.ownerName,
        requestedFrom: info.from,
        requestedTo: info.to,
        confirmedState: this._confirmed,
        inFlightTo: inFlight ? inFlight.to : null,
      });
      this.log.warn("rejected", err.message);
      throw err;
    }

    const batch: TransitionStep[] = [];
    let value = 0;
    if (inFlight) {
      batch.push(this._rollback(inFlight));
      value = startingValue(info.modeOnCanceled ?? "RESET", inFlight.value);
    }

    const id = this._nextId++;
    const started = this._step(id, info.from, info.to, value, "STARTED", info.ownerName);
    batch.push(started);
    this._active = {
      id,
      from: info.from,
      to: info.to,
      ownerName: info.ownerName,
      manual: info.animator === null,
      value,
      lastStep: started,
      handle: null,
    };
    if (info.guardDelayMs !== undefined) {
      this.log.record("guard", `${info.ownerName} held ${info.from}→${info.to} for ${info.guardDelayMs}ms`);
    }
    this._emit(...batch);

    // A listener may already have superseded this transition while STARTED was delivered.
    if (info.animator && this._active?.id === id) {
      const handle = info.animator.start(value, {
        onUpdate: (v) => this._progress(id, v),
        onEnd: () => this._finish(id),
      });
      if (this._active?.id === id) this._active.handle = handle;
      else handle.cancel();
    }
    return id;
  }

  /** Report progress of a manual transition (started with animator: null). */
  updateTransition(id: TransitionId, value: number, state: Exclude<TransitionState, "STARTED">): void {
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      throw transitionError(
        `transition value ${value} is outside [0, 1]`,
        { transitionId: id, value },
        "TRANSITION_INVALID_VALUE",
      );
    }
    const active = this._active;
    if (!active || active.id !== id) {
      this.log.warn("ignored", `update for #${id} ignored; in flight: ${active ? `#${active.id}` : "none"}`);
      return;
    }
    if (!active.manual) {
      this.log.warn("ignored", `update for animated transition #${id} ignored`);
      return;
    }
    if (state === "RUNNING") this._progress(id, value);
    else if (state === "FINISHED") this._finish(id);
    else {
      active.value = Math.max(active.value, value);
      this._emit(this._rollback(active));
    }
  }

  /** Roll the transition in flight back to its origin. No-op when idle. */
  cancelInFlight(): void {
    if (this._active) this._emit(this._rollback(this._active));
  }

  steps(): Subscribable<TransitionStep> {
    return this._steps;
  }

  currentState(): KeyguardState {
    return this._confirmed;
  }

  /** The state the keyguard is committed to: the in-flight destination, else the confirmed state. */
  activeState(): KeyguardState {
    return this._active ? this._active.to : this._confirmed;
  }

  inFlight(): TransitionStep | null {
    return this._active ? this._active.lastStep : null;
  }

  latestStep(): TransitionStep {
    return this._lastEmitted;
  }

  hints(): KeyguardHints {
    return this._hints;
  }

  setHintShown(hint: KeyguardHint, shown: boolean): void {
    if (this._hints[hint] === shown) return;
    this._hints = Object.freeze({ ...this._hints, [hint]: shown });
  }

  private _progress(id: TransitionId, raw: number) {
    const active = this._active;
    if (!active || active.id !== id) return;
    const value = Math.max(active.value, Math.min(1, Math.max(0, raw)));
    active.value = value;
    active.lastStep = this._step(id, active.from, active.to, value, "RUNNING", active.ownerName);
    this._emit(active.lastStep);
  }

  private _finish(id: TransitionId) {
    const active = this._active;
    if (!active || active.id !== id) return;
    this._active = null;
    this._confirmed = active.to;
    if (active.to === "GONE") this._hints = DEFAULT_HINTS;
    this._emit(this._step(id, active.from, active.to, 1, "FINISHED", active.ownerName));
  }

  /** Stops the animation and commits the rollback; the caller emits the returned step. */
  private _rollback(active: ActiveTransition): TransitionStep {
    active.handle?.cancel();
    this._active = null;
    this._confirmed = active.from;
    return this._step(active.id, active.from, active.to, active.value, "CANCELED", active.ownerName);
  }

  private _step(
    transitionId: TransitionId,
    from: KeyguardState,
    to: KeyguardState,
    value: number,
    transitionState: TransitionState,
    ownerName: string,
  ): TransitionStep {
    return Object.freeze({ transitionId, from, to, value, transitionState, ownerName });
  }

  private _emit(...steps: TransitionStep[]) {
    for (const step of steps) {
      this._lastEmitted = step;
      this.log.step(step);
    }
    this._steps.emit(...steps);
  }
}
