export type Clock = () => number;

/**
 * Named wall-clock timers. Only stopped timers are reported.
 */
export class TimeStatsCollector {
  private readonly stats = new Map<string, { start: number; stop: number | null }>();

  constructor(private readonly clock: Clock = Date.now) {}

  start(name: string): void {
    this.stats.set(name, { start: this.clock(), stop: null });
  }

  stop(name: string): void {
    const entry = this.stats.get(name);
    if (entry && entry.stop === null) {
      entry.stop = this.clock();
    }
  }

  isRunning(name: string): boolean {
    return this.stats.get(name)?.stop === null;
  }

  /** Elapsed seconds of every stopped timer, in start order */
  *[Symbol.iterator](): IterableIterator<[string, number]> {
    for (const [name, { start, stop }] of this.stats) {
      if (stop !== null) {
        yield [name, (stop - start) / 1000];
      }
    }
  }
}
