/**
 * Single-slot "work available" signal.
 *
 * notify() never blocks and coalesces: any number of calls before the
 * consumer takes the signal leave exactly one pending wakeup. The first
 * notify() after a take() also invokes the onSignal hook, which a consumer
 * uses to wake whatever loop is waiting on several notifiers at once.
 */
export class Notifier {
  private pending = false;
  private onSignal: () => void;

  constructor(onSignal: () => void = () => {}) {
    this.onSignal = onSignal;
  }

  notify(): void {
    if (this.pending) return;
    this.pending = true;
    this.onSignal();
  }

  /** Consume the pending signal. Returns whether there was one. */
  take(): boolean {
    const was = this.pending;
    this.pending = false;
    return was;
  }

  get isPending(): boolean {
    return this.pending;
  }
}
