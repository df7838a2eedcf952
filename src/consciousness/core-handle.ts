/**
 * Core Handle — the one door into the state engine
 *
 * The life loop and the input channel both reach the engine through
 * this handle. Every tick runs under a single mutex, and the clock is
 * read only after the lock is held, so tick order and elapsed time
 * follow acquisition order rather than call order.
 *
 * Consumers hear about each snapshot after the lock is released;
 * anything slow they do (logging, persistence, model calls) never
 * holds up the other caller.
 */

import { Clock, Snapshot, SnapshotConsumer, TickOrigin } from '../core/types';
import { StateEngine } from './engine';
import { Mutex } from './mutex';

export class CoreHandle {
  private readonly mutex = new Mutex();
  private consumers: Set<SnapshotConsumer> = new Set();

  constructor(
    private readonly engine: StateEngine,
    private readonly clock: Clock = Date.now,
  ) {}

  /**
   * Tick the engine atomically, then fan the snapshot out to consumers.
   */
  async tick(externalInput: number | null, attention: boolean, origin: TickOrigin): Promise<Snapshot> {
    const snapshot = await this.mutex.runExclusive(() =>
      this.engine.tick(externalInput, attention, this.clock())
    );
    this.notify(snapshot, origin);
    return snapshot;
  }

  /**
   * Register a consumer for every future snapshot.
   * @returns Unsubscribe function.
   */
  subscribe(consumer: SnapshotConsumer): () => void {
    this.consumers.add(consumer);
    return () => {
      this.consumers.delete(consumer);
    };
  }

  peek(): Snapshot {
    return this.engine.peek();
  }

  get tickCount(): number {
    return this.engine.peek().tick;
  }

  private notify(snapshot: Snapshot, origin: TickOrigin): void {
    for (const consumer of this.consumers) {
      try {
        consumer(snapshot, origin);
      } catch (err) {
        console.error(`  [core] Consumer error on tick ${snapshot.tick}:`, err);
      }
    }
  }
}
