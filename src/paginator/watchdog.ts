/**
 * Level-triggered wake-up flag. Any number of `set()` calls before a waiter
 * resumes count as one.
 */
export class ActivitySignal {
  private raised = false;
  private readonly waiters = new Set<() => void>();

  get isSet(): boolean {
    return this.raised;
  }

  set(): void {
    this.raised = true;
    for (const wake of this.waiters) wake();
    this.waiters.clear();
  }

  clear(): void {
    this.raised = false;
  }

  /** Resolves true when the flag is (or becomes) raised, false after `ms` without it. */
  wait(ms: number): Promise<boolean> {
    if (this.raised) return Promise.resolve(true);
    return new Promise<boolean>((resolve) => {
      const wake = () => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.waiters.delete(wake);
        resolve(false);
      }, ms);
      timer.unref?.();
      this.waiters.add(wake);
    });
  }
}

export type WatchdogState = 'running' | 'stopped';

/**
 * Calls `onIdle` once if no `ping()` arrives for `intervalMs`. Each ping
 * restarts the wait. `stop()` ends the loop without calling `onIdle`.
 */
export class IdleWatchdog {
  private readonly signal = new ActivitySignal();
  private current: WatchdogState = 'running';
  private task: Promise<void> | null = null;

  constructor(
    private readonly intervalMs: number,
    private readonly onIdle: () => Promise<void>,
  ) {}

  get state(): WatchdogState {
    return this.current;
  }

  /** Starts the loop; repeated calls return the same task. */
  start(): Promise<void> {
    this.task ??= this.loop();
    return this.task;
  }

  ping(): void {
    if (this.current === 'running') this.signal.set();
  }

  stop(): void {
    if (this.current === 'stopped') return;
    this.current = 'stopped';
    // wake the pending wait so the loop exits now rather than at the deadline
    this.signal.set();
  }

  private async loop(): Promise<void> {
    while (this.current === 'running') {
      const pinged = await this.signal.wait(this.intervalMs);
      if (pinged) {
        this.signal.clear();
        continue;
      }
      if (this.current !== 'running') return;
      this.current = 'stopped';
      await this.onIdle();
      return;
    }
  }
}
