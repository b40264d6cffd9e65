export type KillSwitchState = {
  tripped: boolean;
  reason: string | null;
  at: number | null;    // ms epoch
};

type Listener = (state: KillSwitchState) => void;

/**
 * Global stop flag shared by every symbol worker and the control channel.
 * Listeners run synchronously on each transition, so a trip is fully applied
 * before trip() returns.
 */
export class KillSwitch {
  private state: KillSwitchState = { tripped: false, reason: null, at: null };
  private listeners: Listener[] = [];

  isTripped(): boolean {
    return this.state.tripped;
  }

  getState(): KillSwitchState {
    return { ...this.state };
  }

  /** Returns false when already tripped. */
  trip(reason: string, at: number = Date.now()): boolean {
    if (this.state.tripped) return false;
    this.state = { tripped: true, reason, at };
    console.warn(`[KillSwitch] TRIPPED: ${reason}`);
    this.emit();
    return true;
  }

  reset(at: number = Date.now()): boolean {
    if (!this.state.tripped) return false;
    this.state = { tripped: false, reason: null, at };
    console.log("[KillSwitch] reset");
    this.emit();
    return true;
  }

  onChange(listener: Listener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  private emit(): void {
    const snapshot = this.getState();
    for (const l of this.listeners) l(snapshot);
  }
}
