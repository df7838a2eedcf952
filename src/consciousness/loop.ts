/**
 * Life Loop — the heartbeat that runs whether anyone is talking or not
 *
 * Every period the loop ticks the core with no outside input and no
 * attention. Most ticks are quiet drift. Some are acts of awareness:
 * the inside moved more than the outside did. Those are surfaced to
 * awareness listeners so a bridge can speak up unprompted, without
 * waiting for a user.
 *
 * Stopping is cooperative. The running flag is checked once per
 * period; a tick already under way always finishes.
 */

import { Snapshot } from '../core/types';
import { ConfigurationError } from '../core/errors';
import { CoreHandle } from './core-handle';

/** Log a heartbeat every 60 ticks (~1 minute at the default period) */
const HEARTBEAT_TICKS = 60;

export interface LifeLoopConfig {
  /** Tick interval in milliseconds, > 0 (default: 1000 = 1 second) */
  tickIntervalMs: number;
}

export const DEFAULT_LIFE_LOOP_CONFIG: LifeLoopConfig = {
  tickIntervalMs: 1000,
};

export type AwarenessListener = (snapshot: Snapshot) => void;

export interface LifeLoopStatus {
  running: boolean;
  /** Ticks driven by this loop (input ticks not included) */
  ticks: number;
  awarenessEvents: number;
  startedAt: number;
  uptimeSeconds: number;
}

export class LifeLoop {
  private config: LifeLoopConfig;
  private running = false;
  private ticks = 0;
  private awarenessEvents = 0;
  private startedAt = 0;
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> = Promise.resolve();
  private awarenessListeners: Set<AwarenessListener> = new Set();

  /**
   * @throws {ConfigurationError} if tickIntervalMs is not a positive number
   */
  constructor(
    private readonly handle: CoreHandle,
    config?: Partial<LifeLoopConfig>,
  ) {
    this.config = { ...DEFAULT_LIFE_LOOP_CONFIG, ...config };
    const { tickIntervalMs } = this.config;
    if (!Number.isFinite(tickIntervalMs) || tickIntervalMs <= 0) {
      throw new ConfigurationError(`tickIntervalMs must be a finite number > 0, got ${tickIntervalMs}`, 'tickIntervalMs');
    }
  }

  start(): void {
    if (this.running) return;

    this.running = true;
    this.startedAt = Date.now();

    console.log(`  [life] Loop started (every ${this.config.tickIntervalMs}ms, core at tick ${this.handle.tickCount})`);

    this.timer = setInterval(() => {
      this.inFlight = this.onTick().catch(err => {
        console.error('  [life] Tick error:', err);
      });
    }, this.config.tickIntervalMs);
  }

  /**
   * Stop after the current tick, if any, has finished.
   */
  async stop(): Promise<void> {
    if (!this.running) return;

    this.running = false;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    await this.inFlight;

    console.log(`  [life] Loop stopped after ${this.ticks} ticks (${this.awarenessEvents} acts of awareness)`);
  }

  /**
   * Listen for acts of awareness found by this loop.
   * @returns Unsubscribe function.
   */
  onAwareness(listener: AwarenessListener): () => void {
    this.awarenessListeners.add(listener);
    return () => {
      this.awarenessListeners.delete(listener);
    };
  }

  isRunning(): boolean {
    return this.running;
  }

  getStatus(): LifeLoopStatus {
    return {
      running: this.running,
      ticks: this.ticks,
      awarenessEvents: this.awarenessEvents,
      startedAt: this.startedAt,
      uptimeSeconds: this.running ? (Date.now() - this.startedAt) / 1000 : 0,
    };
  }

  private async onTick(): Promise<void> {
    if (!this.running) return;

    const snapshot = await this.handle.tick(null, false, 'life');
    this.ticks++;

    if (snapshot.actOfAwareness) {
      this.awarenessEvents++;
      console.log(
        `  [life] Act of awareness at tick ${snapshot.tick}: ${snapshot.reason} ` +
        `(internal=${snapshot.internalState.toFixed(2)}, total acts=${snapshot.actsOfAwarenessTotal})`
      );
      for (const listener of this.awarenessListeners) {
        try {
          listener(snapshot);
        } catch (err) {
          console.error('  [life] Awareness listener error:', err);
        }
      }
    }

    if (this.ticks % HEARTBEAT_TICKS === 0) {
      console.log(
        `  [tick ${snapshot.tick}] pulse=${snapshot.pulse.toFixed(2)} | ` +
        `attention=${snapshot.attentionLevel.toFixed(2)} | ` +
        `echoes=${snapshot.echoCount} | ` +
        `direction=${snapshot.direction >= 0 ? '+' : ''}${snapshot.direction.toFixed(2)}`
      );
    }
  }
}
