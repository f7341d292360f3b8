/**
 * Single-flight cycle scheduler. A cycle that is still running when the
 * next tick comes due makes that tick a no-op; a stop request (stop() or
 * an aborted signal) takes effect between cycles, never mid-cycle.
 */
import { errorMessage } from '../utils/errors';

export type CycleOutcome = 'completed' | 'failed' | 'skipped';

export class CycleScheduler {
  private running = false;
  private stopped = false;
  private wake: (() => void) | null = null;

  constructor(
    private readonly cycle:      () => Promise<unknown>,
    private readonly intervalMs: number,
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  async runOnce(): Promise<CycleOutcome> {
    if (this.running) {
      console.log('⏭️  Previous cycle still running — tick skipped');
      return 'skipped';
    }

    this.running = true;
    try {
      await this.cycle();
      return 'completed';
    } catch (err) {
      console.error(`❌ Cycle error: ${errorMessage(err)}`);
      return 'failed';
    } finally {
      this.running = false;
    }
  }

  async start(signal?: AbortSignal): Promise<void> {
    this.stopped = false;
    const onAbort = () => this.stop();
    if (signal?.aborted) this.stop();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      while (!this.stopped) {
        await this.runOnce();
        if (this.stopped) break;
        await this.sleep(this.intervalMs);
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  stop(): void {
    this.stopped = true;
    this.wake?.();
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }
}
