import { logger } from '../utils/logger';

export type WatchdogState = 'idle' | 'running' | 'stopped';

/**
 * Per-move countdown owned by a single GameEngine.
 *
 * When the countdown elapses without a reset or stop, `onElapsed` runs and
 * the countdown re-arms at full duration until it is stopped, so a firing
 * that could not act is retried one timeout later. A stopped watchdog stays
 * inert until `start` is called again; `dispose` makes it permanently inert.
 */
export class TurnWatchdog {
  private timer: NodeJS.Timeout | null = null;
  private durationMs = 0;
  private state: WatchdogState = 'idle';
  private disposed = false;

  constructor(private readonly onElapsed: () => void) {}

  get isRunning(): boolean {
    return this.state === 'running';
  }

  get currentState(): WatchdogState {
    return this.state;
  }

  /**
   * Begin a fresh countdown. Any countdown already in flight is cancelled
   * first, so at most one timer exists per watchdog.
   */
  start(durationMs: number): void {
    if (this.disposed) {
      return;
    }
    this.clearTimer();
    this.durationMs = durationMs;
    this.state = 'running';
    logger.debug('Turn watchdog started', { durationMs });
    this.arm();
  }

  /**
   * Restart the countdown at full duration. No-op unless running.
   */
  reset(): void {
    if (this.state !== 'running') {
      return;
    }
    this.clearTimer();
    this.arm();
  }

  stop(): void {
    if (this.state === 'running') {
      logger.debug('Turn watchdog stopped');
    }
    this.clearTimer();
    if (this.state !== 'idle') {
      this.state = 'stopped';
    }
  }

  dispose(): void {
    this.stop();
    this.disposed = true;
  }

  private arm(): void {
    this.timer = setTimeout(() => this.fire(), this.durationMs);
  }

  private fire(): void {
    this.timer = null;
    logger.info('Turn watchdog elapsed', { durationMs: this.durationMs });

    try {
      this.onElapsed();
    } catch (error) {
      logger.error('Turn watchdog handler failed', { error });
    }

    // The handler may itself have reset, stopped or restarted the countdown.
    if (this.state === 'running' && this.timer === null && !this.disposed) {
      this.arm();
    }
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
