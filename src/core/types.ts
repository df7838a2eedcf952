/**
 * Core Types
 *
 * The vocabulary of the limbic core: what configures an engine,
 * what it remembers between ticks, and what it hands out after each one.
 *
 *   EngineConfig  — immutable tuning for one engine
 *   EngineState   — the single live state an engine owns
 *   Snapshot      — a frozen copy of that state at the end of a tick
 */

// ─── Configuration ──────────────────────────────────────────────────

export interface EngineConfig {
  /** Angular rate of the pulse rhythm (radians per second) */
  baseFrequency: number;
  /** Magnitude of the per-tick noise added to the pulse */
  noiseAmplitude: number;
  /** Magnitude of the per-tick internal drift */
  internalVariability: number;
  /** Chance per tick of a large unprompted internal jump (0-1) */
  spontaneousEventProbability: number;
  /** Chance per tick that the rhythm's phase bias shifts on its own (0-1) */
  rhythmChangeProbability: number;
  /** Echo decay time in seconds */
  echoLifetime: number;
  /** Magnitude beyond which an internal change counts as an act of awareness */
  awarenessThreshold: number;
  /** External signals are clamped to [-limit, +limit] */
  externalSignalLimit: number;
}

// ─── State ──────────────────────────────────────────────────────────

export interface EchoTrace {
  createdAtTick: number;
  /** Seconds left before the trace is purged */
  remainingLifetime: number;
  /** Attention level at the moment the trace was laid down */
  strength: number;
}

export interface EngineState {
  tickCount: number;
  /** Epoch ms of the last tick, null before the first one */
  lastTime: number | null;
  /** Accumulated rhythm phase (radians) */
  phase: number;
  /** Directional tilt of the rhythm, nudged by attention */
  phaseBias: number;
  internalState: number;
  pulse: number;
  attentionLevel: number;
  echoTraces: EchoTrace[];
  direction: number;
  lastTotalState: number;
  actsOfAwarenessTotal: number;
}

// ─── Snapshot ───────────────────────────────────────────────────────

export type AwarenessReason =
  | 'spontaneous_internal_change'  // An unprompted jump large enough to notice
  | 'dominant_internal_change'     // Internal drift outweighed the outside world
  | 'none';

export interface Snapshot {
  readonly tick: number;
  /** Epoch ms the tick was computed for */
  readonly time: number;
  readonly pulse: number;
  readonly attentionLevel: number;
  readonly echoCount: number;
  readonly internalState: number;
  /** Normalized input actually applied this tick */
  readonly externalSignal: number;
  readonly totalState: number;
  /** Smoothed momentum of total-state change */
  readonly direction: number;
  /** Total-state change since the previous tick */
  readonly delta: number;
  readonly irregularRhythm: boolean;
  readonly spontaneousEvent: boolean;
  readonly actOfAwareness: boolean;
  readonly reason: AwarenessReason;
  readonly actsOfAwarenessTotal: number;
}

// ─── Callers ────────────────────────────────────────────────────────

/** Which caller drove a tick */
export type TickOrigin = 'life' | 'input';

export type SnapshotConsumer = (snapshot: Snapshot, origin: TickOrigin) => void;

/** Uniform source in [0, 1), seedable for tests */
export type RandomSource = () => number;

/** Epoch milliseconds */
export type Clock = () => number;

// ─── Service ────────────────────────────────────────────────────────

export interface ServiceConfig {
  port: number;
  /** Life loop period in milliseconds */
  tickIntervalMs: number;
  /** SQLite file for the snapshot log */
  dbPath: string;
  /** Seed for the engine's random source; unseeded when absent */
  seed?: string;
  engine: EngineConfig;
}
