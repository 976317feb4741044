import { formatKeyguardError, isStaleOriginError } from "../runtime/errorTaxonomy";
import { createFrameAnimator } from "./animator";
import { PendingAction } from "./pendingAction";
import type { PolicyConfig, TransitionDecision, TransitionPolicy } from "./policies";
import { snapshotSignals, type KeyguardSignals } from "./signals";
import type { Unsubscribe } from "./stepStream";
import type { KeyguardTransitionRepository } from "./transitionRepository";
import type { KeyguardState, TransitionId } from "./types";

export type InteractorStatus = "DORMANT" | "ACTIVE";

export type InteractorConfig = PolicyConfig & { frameIntervalMs: number };

export type FromStateInteractorDeps = {
  policy: TransitionPolicy;
  repository: KeyguardTransitionRepository;
  signals: KeyguardSignals;
  config: InteractorConfig;
};

function decisionKey(decision: Extract<TransitionDecision, { kind: "transition" }>) {
  return `${decision.to}:${decision.reason}`;
}

/**
 * Drives the transition-out policy of one source state. Listens to the
 * policy's signals only while ACTIVE, and only requests transitions while
 * the repository is committed to its source state.
 */
export class FromStateTransitionInteractor {
  readonly from: KeyguardState;
  readonly ownerName: string;
  private _status: InteractorStatus = "DORMANT";
  private _subscriptions: Unsubscribe[] = [];
  private readonly _guard = new PendingAction();

  constructor(private readonly deps: FromStateInteractorDeps) {
    this.from = deps.policy.from;
    this.ownerName = `From${deps.policy.from}TransitionInteractor`;
  }

  get status(): InteractorStatus {
    return this._status;
  }

  get pendingGuard(): string | null {
    return this._guard.pendingKey;
  }

  activate(): void {
    if (this._status === "ACTIVE") return;
    this._status = "ACTIVE";
    const { signals, policy } = this.deps;
    this._subscriptions = policy.signals.map((name) => signals[name].subscribe(() => this.onSignal()));
    this.onSignal();
  }

  deactivate(): void {
    if (this._status === "DORMANT") return;
    this._status = "DORMANT";
    for (const unsubscribe of this._subscriptions) unsubscribe();
    this._subscriptions = [];
    this._guard.cancel();
  }

  /** Re-evaluate the policy against the latest signal values. */
  onSignal(): void {
    if (!this._isCommittedHere()) return;
    const decision = this._decide();
    if (decision.kind === "none") {
      this._guard.cancel();
      return;
    }
    if (decision.guardMs === undefined || decision.guardMs <= 0) {
      this._guard.cancel();
      this._request(decision);
      return;
    }
    const key = decisionKey(decision);
    const guardMs = decision.guardMs;
    this._guard.arm(key, guardMs, () => {
      // Sample again at fire time; a stale guard does nothing.
      if (!this._isCommittedHere()) return;
      const latest = this._decide();
      if (latest.kind !== "transition" || decisionKey(latest) !== key) return;
      this._request(latest, guardMs);
    });
  }

  private _decide(): TransitionDecision {
    return this.deps.policy.decide(snapshotSignals(this.deps.signals), this.deps.config);
  }

  private _isCommittedHere(): boolean {
    return this._status === "ACTIVE" && this.deps.repository.activeState() === this.from;
  }

  private _request(
    decision: Extract<TransitionDecision, { kind: "transition" }>,
    guardDelayMs?: number,
  ): TransitionId {
    const { repository, config } = this.deps;
    try {
      return repository.startTransition({
        ownerName: this.ownerName,
        from: this.from,
        to: decision.to,
        animator: createFrameAnimator({ durationMs: decision.durationMs, frameIntervalMs: config.frameIntervalMs }),
        guardDelayMs,
      });
    } catch (err) {
      if (isStaleOriginError(err)) {
        console.error(`[keyguard] ${this.ownerName} (${decision.reason}): ${formatKeyguardError(err)}`);
      }
      throw err;
    }
  }
}
