// Single slot holding at most one delayed action.
// Arming a different key cancels whatever was pending; a canceled action never runs.

export class PendingAction {
  private _key: string | null = null;
  private _timer: ReturnType<typeof setTimeout> | null = null;

  get pendingKey(): string | null {
    return this._key;
  }

  /**
   * Schedule `action` after `delayMs`. Re-arming the key that is already
   * pending keeps the original deadline.
   */
  arm(key: string, delayMs: number, action: () => void): void {
    if (this._key === key && this._timer !== null) return;
    this.cancel();
    this._key = key;
    this._timer = setTimeout(() => {
      this._timer = null;
      this._key = null;
      action();
    }, Math.max(0, delayMs));
  }

  cancel(): void {
    if (this._timer !== null) clearTimeout(this._timer);
    this._timer = null;
    this._key = null;
  }
}
