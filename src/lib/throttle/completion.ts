/**
 * One-shot completion signal.
 */
export class CompletionSignal {
  private released = false;
  private resolveDone: (() => void) | undefined;
  private readonly done: Promise<void>;

  constructor() {
    this.done = new Promise<void>((resolve) => {
      this.resolveDone = resolve;
    });
  }

  get isReleased(): boolean {
    return this.released;
  }

  /**
   * Release every current and future waiter. Returns false if already released.
   */
  release(): boolean {
    if (this.released) return false;
    this.released = true;
    this.resolveDone?.();
    return true;
  }

  wait(): Promise<void> {
    return this.done;
  }
}
