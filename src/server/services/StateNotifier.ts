import { GameSnapshot } from '../../shared/types/game';
import { logger } from '../utils/logger';

/**
 * Consumer of full game snapshots, e.g. a persistence mirror.
 */
export interface StateSink {
  readonly name: string;
  write(snapshot: GameSnapshot): Promise<void>;
  /** Release the sink's connection once it has been replaced. */
  close?(): Promise<void>;
}

export interface StateNotifierOptions {
  /** Maximum pending snapshots; the oldest are dropped beyond this. */
  bufferSize: number;
}

/**
 * Fire-and-forget delivery of state changes to an optional sink.
 *
 * `notify` only enqueues and schedules a drain on a later tick; it never
 * awaits the sink and never throws. Without a sink, snapshots are dropped.
 * A slow sink sees at most `bufferSize` pending snapshots, oldest first.
 */
export class StateNotifier {
  private sink: StateSink | null = null;
  private pending: GameSnapshot[] = [];
  private drainScheduled = false;
  private inFlight: Promise<void> | null = null;
  private droppedCount = 0;

  constructor(private readonly options: StateNotifierOptions) {}

  get hasSink(): boolean {
    return this.sink !== null;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  /** Swap the sink, returning the one it replaced. */
  setSink(sink: StateSink | null): StateSink | null {
    const previous = this.sink;
    this.sink = sink;
    if (sink) {
      logger.info('State sink attached', { sink: sink.name });
    } else {
      this.pending = [];
      logger.info('State sink detached');
    }
    return previous;
  }

  notify(snapshot: GameSnapshot): void {
    if (!this.sink) {
      logger.debug('No state sink configured, dropping snapshot', { status: snapshot.status });
      return;
    }

    this.pending.push(snapshot);
    if (this.pending.length > this.options.bufferSize) {
      this.pending.shift();
      this.droppedCount++;
      logger.warn('State sink is behind, dropped oldest snapshot', {
        sink: this.sink.name,
        bufferSize: this.options.bufferSize,
        dropped: this.droppedCount,
      });
    }
    this.scheduleDrain();
  }

  /**
   * Deliver everything currently pending. Resolves once the queue is empty
   * (or the sink was detached); sink failures are logged, never rethrown.
   */
  flush(): Promise<void> {
    if (this.inFlight) {
      // Snapshots queued while that drain ran are part of this flush too.
      return this.inFlight.then(() => (this.pending.length > 0 && this.sink ? this.flush() : undefined));
    }
    const drained = this.drain().finally(() => {
      this.inFlight = null;
      if (this.pending.length > 0 && this.sink) {
        this.scheduleDrain();
      }
    });
    this.inFlight = drained;
    return drained;
  }

  private scheduleDrain(): void {
    if (this.drainScheduled || this.inFlight) {
      return;
    }
    this.drainScheduled = true;
    setImmediate(() => {
      this.drainScheduled = false;
      this.flush().catch((error: unknown) => {
        logger.error('State notification drain failed', { error });
      });
    });
  }

  private async drain(): Promise<void> {
    let next = this.pending.shift();
    while (next && this.sink) {
      const sink = this.sink;
      try {
        await sink.write(next);
      } catch (error) {
        logger.error('State sink write failed', {
          sink: sink.name,
          status: next.status,
          error,
        });
      }
      next = this.pending.shift();
    }
  }
}
