// src/monitor/ready-signal.ts

/**
 * One-shot notification. `promise` resolves on the first `fire()`; later
 * calls do nothing.
 */
export class ReadySignal {
  public readonly promise: Promise<void>;
  private resolve: () => void = () => undefined;
  private fired: boolean = false;

  constructor() {
    this.promise = new Promise<void>(resolve => {
      this.resolve = resolve;
    });
  }

  /** Returns true only for the call that actually fired */
  fire(): boolean {
    if (this.fired) return false;
    this.fired = true;
    this.resolve();
    return true;
  }

  get isFired(): boolean {
    return this.fired;
  }
}
