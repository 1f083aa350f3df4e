/**
 * Single-shot, multi-waiter notification.
 *
 * Set at most once; `wait()` may be called any number of times, before
 * or after the signal is set. Never reset.
 */
export class CompletionSignal {
  private resolveFn: (() => void) | null = null;
  private readonly promise: Promise<void>;
  private setFlag = false;

  constructor() {
    this.promise = new Promise<void>((resolve) => {
      this.resolveFn = resolve;
    });
  }

  get isSet(): boolean {
    return this.setFlag;
  }

  set(): void {
    if (this.setFlag) return;
    this.setFlag = true;
    this.resolveFn?.();
    this.resolveFn = null;
  }

  wait(): Promise<void> {
    return this.promise;
  }
}
