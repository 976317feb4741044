import type { TransitionStep } from "../keyguard/types";

export type TransitionLogKind = "step" | "rejected" | "guard" | "ignored";

export type TransitionLogEntry = {
  seq: number;
  kind: TransitionLogKind;
  message: string;
  ts: number;
};

const LOG_TAG = "[keyguard]";
const MAX_MESSAGE = 400;

export function formatStep(step: TransitionStep) {
  return `#${step.transitionId} ${step.from}→${step.to} ${step.transitionState} ${step.value.toFixed(3)} (${step.ownerName})`;
}

/**
 * Bounded record of what the transition core did, kept for dumps and test
 * assertions. Mirrors entries to the console only when enabled.
 */
export class TransitionLog {
  private _entries: TransitionLogEntry[] = [];
  private _seq = 0;

  constructor(
    private readonly maxEntries = 200,
    private readonly echo = false,
  ) {}

  record(kind: TransitionLogKind, message: string): TransitionLogEntry {
    const entry: TransitionLogEntry = {
      seq: ++this._seq,
      kind,
      message: String(message).slice(0, MAX_MESSAGE),
      ts: Date.now(),
    };
    this._entries.push(entry);
    if (this._entries.length > this.maxEntries) {
      this._entries = this._entries.slice(this._entries.length - this.maxEntries);
    }
    if (this.echo) console.info(`${LOG_TAG} ${kind}: ${entry.message}`);
    return entry;
  }

  step(step: TransitionStep) {
    return this.record("step", formatStep(step));
  }

  warn(kind: TransitionLogKind, message: string) {
    console.warn(`${LOG_TAG} ${message}`);
    return this.record(kind, message);
  }

  entries(): ReadonlyArray<TransitionLogEntry> {
    return this._entries.slice();
  }

  dump(): string {
    return this._entries.map((e) => `${e.seq} ${e.kind} ${e.message}`).join("\n");
  }

  clear() {
    this._entries = [];
  }
}
