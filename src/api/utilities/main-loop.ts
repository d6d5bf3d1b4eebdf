import { createLogger } from '../../lib/logger.js';

const log = createLogger('MainLoop');

/**
 * Unit of work dispatched by a {@link MainLoop}.
 */
export type LoopTask = () => void | Promise<void>;

/**
 * Background dispatch loop.
 *
 * Runs invoked tasks one at a time, in order, on its own async task. Bus
 * handlers run here so that message handling never overlaps.
 *
 * @example
 * ```typescript
 * const loop = new MainLoop();
 * loop.start();
 * loop.invoke(() => console.log('on the loop'));
 * loop.quit();
 * await loop.join();
 * ```
 */
export class MainLoop {
  private tasks: LoopTask[] = [];
  private wake: (() => void) | null = null;
  private running: Promise<void> | null = null;
  private quitting = false;

  /**
   * Whether the loop was started and has not finished.
   */
  get isRunning(): boolean {
    return this.running !== null && !this.quitting;
  }

  /**
   * Start dispatching. No-op if already started.
   */
  start(): void {
    if (this.running) {
      return;
    }
    this.running = this.run();
  }

  /**
   * Queue a task.
   *
   * @returns false if the loop has quit
   */
  invoke(task: LoopTask): boolean {
    if (this.quitting) {
      return false;
    }
    this.tasks.push(task);
    this.signal();
    return true;
  }

  /**
   * Stop after the tasks already queued.
   */
  quit(): void {
    this.quitting = true;
    this.signal();
  }

  /**
   * Wait for the loop to finish. Resolves at once if it never started.
   */
  async join(): Promise<void> {
    await this.running;
  }

  private signal(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private async run(): Promise<void> {
    while (true) {
      const [task] = this.tasks.splice(0, 1);
      if (task) {
        try {
          await task();
        } catch (error) {
          log.warn('Loop task failed', { error });
        }
        continue;
      }

      if (this.quitting) {
        return;
      }
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }
}
