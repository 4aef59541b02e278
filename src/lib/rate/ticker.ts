/**
 * Fixed-cadence tick counter on top of setInterval.
 */

export interface TickerOptions {
  periodMs: number;
  /** Timers never fire faster than this; missed ticks are counted on the next fire */
  minIntervalMs: number;
  now: () => number;
}

// Node raises shorter setInterval delays to 1ms
const TIMER_RESOLUTION_MS = 1;

// Backlog kept across late fires, in timer intervals
const BACKLOG_INTERVALS = 8;

// Absorbs float error in elapsed / period (e.g. 3 / 0.1)
const EPSILON = 1e-9;

/**
 * Calls `onTick(ticks)` with the number of periods due since the previous
 * call.
 *
 * A period at least as long as the timer interval is one tick per timer fire.
 * Shorter periods are batched: each fire counts the whole periods elapsed on
 * `now()`, so late fires catch up. A backlog larger than a few intervals
 * (after a stalled event loop) is dropped rather than released at once.
 */
export class Ticker {
  private timer: NodeJS.Timeout | undefined;
  private anchor = 0;
  private emitted = 0;
  private readonly intervalMs: number;
  private readonly batched: boolean;
  private readonly maxBacklog: number;

  constructor(
    private readonly options: TickerOptions,
    private readonly onTick: (ticks: number) => void,
  ) {
    this.intervalMs = Math.max(
      options.periodMs,
      options.minIntervalMs,
      TIMER_RESOLUTION_MS,
    );
    this.batched = options.periodMs < this.intervalMs;
    this.maxBacklog =
      Math.ceil(this.intervalMs / options.periodMs - EPSILON) * BACKLOG_INTERVALS;
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  /** Interval the underlying timer is scheduled at */
  get timerIntervalMs(): number {
    return this.intervalMs;
  }

  start(): void {
    if (this.timer) return;
    this.anchor = this.options.now();
    this.emitted = 0;
    this.timer = setInterval(() => this.fire(), this.intervalMs);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = undefined;
  }

  private fire(): void {
    if (!this.batched) {
      this.onTick(1);
      return;
    }

    const elapsed = this.options.now() - this.anchor;
    const due = Math.floor(elapsed / this.options.periodMs + EPSILON);
    const ticks = due - this.emitted;
    if (ticks <= 0) return;

    // Anything beyond the backlog window is skipped, not owed
    this.emitted = due;
    this.onTick(Math.min(ticks, this.maxBacklog));
  }
}
