/**
 * Cooperative pause/resume point for catalog commits.
 *
 * The crawler and the downloader may work on the same source at once. They
 * fetch and download freely, but each store commit runs inside
 * {@link WriteGate.runExclusive} so two commits never interleave. This is not
 * a general lock: only commit sections go through it.
 */
export class WriteGate {
  private paused = false;
  private waiters: Array<() => void> = [];

  isPaused(): boolean {
    return this.paused;
  }

  pause() {
    this.paused = true;
  }

  resume() {
    this.paused = false;
    const toWake = this.waiters;
    this.waiters = [];
    for (const wake of toWake) wake();
  }

  async waitIfPaused(): Promise<void> {
    while (this.paused) {
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
  }

  async runExclusive<T>(section: () => Promise<T>): Promise<T> {
    // No await between the loop exit and pause(): another waiter woken by the
    // same resume() cannot slip in.
    while (this.paused) {
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
    this.pause();
    try {
      return await section();
    } finally {
      this.resume();
    }
  }
}

export const commitGate = new WriteGate();
