/**
 * RebuildScheduler — debounced, non-overlapping rebuilds.
 *
 * A burst of change notifications collapses into one rebuild once the
 * debounce window passes quietly. Notifications that arrive mid-build mark
 * the schedule dirty so a single follow-up rebuild runs afterwards.
 */

import { errorMessage } from '../errors.js';

export type RebuildFn = () => Promise<void>;

export class RebuildScheduler {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running: Promise<void> | null = null;
  private dirty = false;
  private closed = false;

  constructor(
    private readonly rebuild: RebuildFn,
    private readonly debounceMs: number,
  ) {}

  /** Start or restart the debounce window. */
  notify(): void {
    if (this.closed) return;
    if (this.running) {
      this.dirty = true;
      return;
    }
    this.arm();
  }

  /** True while a rebuild is executing. */
  isBuilding(): boolean {
    return this.running !== null;
  }

  /** Cancel any pending rebuild and wait for a running one to finish. */
  async close(): Promise<void> {
    this.closed = true;
    this.dirty = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.running) {
      await this.running;
    }
  }

  private arm(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      // Deferred so `running` is set before run() can reach its finally block.
      this.running = Promise.resolve().then(() => this.run());
    }, this.debounceMs);
  }

  private async run(): Promise<void> {
    try {
      await this.rebuild();
    } catch (err) {
      console.error(`[watch] Rebuild failed: ${errorMessage(err)}`);
    } finally {
      this.running = null;
      if (this.dirty && !this.closed) {
        this.dirty = false;
        this.arm();
      }
    }
  }
}
