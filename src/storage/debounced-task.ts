import { systemClock, type Clock } from "../models";

export const DEBOUNCE_MS = 150;

export interface DebouncedTaskOptions {
  delayMs?: number;
  clock?: Clock;
  /** Receives whatever the action throws. The task itself never rejects. */
  onError: (error: unknown) => void;
}

/**
 * Runs an async action once things have been quiet for `delayMs`. Each
 * `schedule()` restarts the wait. Runs never overlap: a run that comes due
 * while another is in progress starts after it, and a run in progress is
 * never cancelled.
 */
export class DebouncedTask {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running: Promise<void> | null = null;
  /** Runs started and not yet finished, including ones waiting their turn. */
  private queued = 0;
  private waiters: Array<() => void> = [];
  private readonly delayMs: number;
  private readonly clock: Clock;
  private readonly onError: (error: unknown) => void;

  constructor(
    private readonly action: () => Promise<void>,
    options: DebouncedTaskOptions,
  ) {
    this.delayMs = options.delayMs ?? DEBOUNCE_MS;
    this.clock = options.clock ?? systemClock;
    this.onError = options.onError;
  }

  /** True while a run is waiting for its timer or executing. */
  public get pending(): boolean {
    return this.timer !== null || this.queued > 0;
  }

  public schedule(): void {
    if (this.timer !== null) this.clock.clearTimeout(this.timer);
    this.timer = this.clock.setTimeout(() => {
      this.timer = null;
      void this.run();
    }, this.delayMs);
  }

  /** Skips the wait: a scheduled run starts now. Resolves once nothing is pending. */
  public async flush(): Promise<void> {
    if (this.timer !== null) {
      this.clock.clearTimeout(this.timer);
      this.timer = null;
      await this.run();
    }
    await this.idle();
  }

  public idle(): Promise<void> {
    if (!this.pending) return Promise.resolve();
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  /** Drops a scheduled run. A run already executing still finishes. */
  public cancel(): void {
    if (this.timer !== null) {
      this.clock.clearTimeout(this.timer);
      this.timer = null;
    }
    this.notifyIfIdle();
  }

  private async run(): Promise<void> {
    this.queued++;
    while (this.running) await this.running;

    const current = this.execute();
    this.running = current;
    await current;
    this.running = null;
    this.queued--;
    this.notifyIfIdle();
  }

  private async execute(): Promise<void> {
    try {
      await this.action();
    } catch (error) {
      this.onError(error);
    }
  }

  private notifyIfIdle(): void {
    if (this.pending) return;
    const waiters = this.waiters;
    this.waiters = [];
    for (const resolve of waiters) resolve();
  }
}
