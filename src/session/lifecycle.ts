/**
 * State shared by the extractor and every maintenance routine of one
 * session. Passed by reference; each mutation completes synchronously.
 */
export class SessionLifecycle {
  private readonly now: () => number;
  private readonly wakers = new Set<() => void>();
  private stopped = false;
  private stopReason: string | null = null;
  private lastActivityAt: number;

  public constructor(now: () => number = () => Date.now()) {
    this.now = now;
    this.lastActivityAt = now();
  }

  public isStopped(): boolean {
    return this.stopped;
  }

  public getStopReason(): string | null {
    return this.stopReason;
  }

  /**
   * Returns true only for the call that actually stopped the session; the
   * first reason wins.
   */
  public stop(reason: string): boolean {
    if (this.stopped) {
      return false;
    }

    this.stopped = true;
    this.stopReason = reason;
    const wakers = [...this.wakers];
    this.wakers.clear();
    for (const wake of wakers) {
      wake();
    }
    return true;
  }

  public markActivity(): void {
    this.lastActivityAt = this.now();
  }

  public getLastActivityAt(): number {
    return this.lastActivityAt;
  }

  /**
   * Sleeps for `ms`, waking early when the session stops. Resolves to
   * whether the session is still running.
   */
  public sleep(ms: number): Promise<boolean> {
    if (this.stopped) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      const wake = (): void => {
        clearTimeout(timer);
        this.wakers.delete(wake);
        resolve(!this.stopped);
      };
      const timer = setTimeout(wake, Math.max(0, ms));
      this.wakers.add(wake);
    });
  }
}
