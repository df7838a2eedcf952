/**
 * State Engine — the rhythm underneath the voice
 *
 * One tick advances four coupled processes:
 *
 *   PULSE     → a sinusoidal "breathing" rhythm plus fresh noise
 *   ATTENTION → rises when observed, decays exponentially when not
 *   ECHO      → each moment of attention leaves a trace that fades
 *   DRIFT     → the internal state wanders, and sometimes jumps
 *
 * Then it compares what moved the total state: its own drift or the
 * outside signal. When the inside wins by a clear margin, that is
 * an act of awareness.
 *
 * The engine performs no I/O and never awaits. It is a state
 * transition plus accumulated history; callers supply time and chance.
 */

import {
  AwarenessReason, EchoTrace, EngineConfig, EngineState, RandomSource, Snapshot,
} from '../core/types';
import { DEFAULT_ENGINE_CONFIG, validateEngineConfig } from '../core/config';
import { createRandomSource, uniform } from './random';

// ─── Constants ──────────────────────────────────────────────────────

/** Fraction of the remaining gap to 1 closed by one attentive tick */
const ATTENTION_GAIN = 0.4;
/** Per-second decay rate (0.9 retained per second) */
const ATTENTION_DECAY_RATE = -Math.log(0.9);
/** Phase tilt applied when attention is given */
const ATTENTION_TILT_MIN = 0.02;
const ATTENTION_TILT_MAX = 0.07;
/** Spontaneous rhythm shift range */
const RHYTHM_SHIFT = 0.03;
/** Ordinary drift is U(-0.5, 0.5) scaled by internalVariability */
const DRIFT_SPAN = 0.5;
/** Spontaneous jumps are U(-1, 1) on top of the drift */
const SPONTANEOUS_JUMP_SCALE = 1.0;
/** Weight of the newest delta in the direction average */
const DIRECTION_SMOOTHING = 0.3;
/** Noise louder than this fraction of the rhythm marks the tick irregular */
const IRREGULAR_NOISE_FRACTION = 0.5;

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export interface StateEngineOptions {
  random?: RandomSource;
}

export class StateEngine {
  readonly config: Readonly<EngineConfig>;
  private random: RandomSource;
  private state: EngineState;
  private last: Snapshot | null = null;

  /**
   * @throws {ConfigurationError} if any merged config field is out of range
   */
  constructor(config?: Partial<EngineConfig>, options: StateEngineOptions = {}) {
    this.config = Object.freeze(validateEngineConfig({ ...DEFAULT_ENGINE_CONFIG, ...config }));
    this.random = options.random ?? createRandomSource();
    this.state = {
      tickCount: 0,
      lastTime: null,
      phase: 0,
      phaseBias: 0,
      internalState: 0,
      pulse: 0,
      attentionLevel: 0,
      echoTraces: [],
      direction: 0,
      lastTotalState: 0,
      actsOfAwarenessTotal: 0,
    };
  }

  /**
   * Advance the engine by one step.
   *
   * @param externalInput - Numeric signal from outside; null contributes 0.
   * @param attention - Whether the engine is being observed this tick.
   * @param now - Epoch ms. A value earlier than the previous tick is
   *   treated as no elapsed time; the reference time never moves back.
   */
  tick(externalInput: number | null, attention: boolean, now: number): Snapshot {
    const prev = this.state;
    const { config, random } = this;

    // 1. Elapsed time
    let dt = 0;
    let time = now;
    if (prev.lastTime !== null) {
      if (now >= prev.lastTime) {
        dt = (now - prev.lastTime) / 1000;
      } else {
        time = prev.lastTime;
      }
    }

    // 2. Pulse: rhythm + noise, resampled every tick
    const phase = prev.phase + config.baseFrequency * dt;
    const rhythm = Math.sin(phase + prev.phaseBias);
    const noise = uniform(random, -1, 1) * config.noiseAmplitude;
    const pulse = clamp((1 + rhythm + noise) / 2, 0, 1);

    // 3. Attention
    let attentionLevel: number;
    let phaseBias = prev.phaseBias;
    if (attention) {
      attentionLevel = prev.attentionLevel + ATTENTION_GAIN * (1 - prev.attentionLevel);
      phaseBias += uniform(random, ATTENTION_TILT_MIN, ATTENTION_TILT_MAX);
    } else {
      attentionLevel = prev.attentionLevel * Math.exp(-ATTENTION_DECAY_RATE * dt);
    }
    attentionLevel = clamp(attentionLevel, 0, 1);

    if (random() < config.rhythmChangeProbability) {
      phaseBias += uniform(random, -RHYTHM_SHIFT, RHYTHM_SHIFT);
    }

    // 4. Echo bookkeeping: age, purge, then lay down this tick's trace
    const echoTraces: EchoTrace[] = [];
    for (const trace of prev.echoTraces) {
      const remainingLifetime = trace.remainingLifetime - dt;
      if (remainingLifetime > 0) {
        echoTraces.push({ ...trace, remainingLifetime });
      }
    }
    const tickCount = prev.tickCount + 1;
    if (attention) {
      echoTraces.push({
        createdAtTick: tickCount,
        remainingLifetime: config.echoLifetime,
        strength: attentionLevel,
      });
    }

    // 5. Internal drift, occasionally a spontaneous jump
    const drift = uniform(random, -DRIFT_SPAN, DRIFT_SPAN) * config.internalVariability;
    let jump = 0;
    const spontaneousEvent = random() < config.spontaneousEventProbability;
    if (spontaneousEvent) {
      jump = uniform(random, -1, 1) * SPONTANEOUS_JUMP_SCALE;
    }
    const internalChange = drift + jump;
    const internalState = prev.internalState + internalChange;

    // 6-9. External signal, total, delta, direction
    const externalSignal = this.normalizeSignal(externalInput);
    const totalState = internalState + externalSignal;
    const delta = totalState - prev.lastTotalState;
    const direction = (1 - DIRECTION_SMOOTHING) * prev.direction + DIRECTION_SMOOTHING * delta;

    // 10. Who moved the state?
    const reason = this.classify(spontaneousEvent, Math.abs(jump), Math.abs(internalChange), Math.abs(externalSignal));
    const actOfAwareness = reason !== 'none';
    const actsOfAwarenessTotal = prev.actsOfAwarenessTotal + (actOfAwareness ? 1 : 0);

    // 11. Diagnostic only
    const irregularRhythm = Math.abs(noise) > IRREGULAR_NOISE_FRACTION * Math.abs(rhythm);

    // 12. Commit
    this.state = {
      tickCount,
      lastTime: time,
      phase,
      phaseBias,
      internalState,
      pulse,
      attentionLevel,
      echoTraces,
      direction,
      lastTotalState: totalState,
      actsOfAwarenessTotal,
    };

    this.last = Object.freeze({
      tick: tickCount,
      time,
      pulse,
      attentionLevel,
      echoCount: echoTraces.length,
      internalState,
      externalSignal,
      totalState,
      direction,
      delta,
      irregularRhythm,
      spontaneousEvent,
      actOfAwareness,
      reason,
      actsOfAwarenessTotal,
    });
    return this.last;
  }

  /**
   * The most recent snapshot, without advancing time.
   * Before the first tick this is a zeroed snapshot.
   */
  peek(): Snapshot {
    if (this.last) return this.last;

    const initial: Snapshot = {
      tick: 0,
      time: 0,
      pulse: 0,
      attentionLevel: 0,
      echoCount: 0,
      internalState: 0,
      externalSignal: 0,
      totalState: 0,
      direction: 0,
      delta: 0,
      irregularRhythm: false,
      spontaneousEvent: false,
      actOfAwareness: false,
      reason: 'none',
      actsOfAwarenessTotal: 0,
    };
    return Object.freeze(initial);
  }

  /**
   * Deep copy of the live state, for diagnostics.
   */
  getState(): EngineState {
    return {
      ...this.state,
      echoTraces: this.state.echoTraces.map(trace => ({ ...trace })),
    };
  }

  // ─── Internals ────────────────────────────────────────────────────

  private normalizeSignal(value: number | null): number {
    if (value === null || Number.isNaN(value)) return 0;
    const limit = this.config.externalSignalLimit;
    return clamp(value, -limit, limit);
  }

  /**
   * Spontaneous jumps win outright when large enough. Otherwise the
   * internal change has to beat both the outside signal and the threshold.
   */
  private classify(
    spontaneousEvent: boolean,
    jumpMagnitude: number,
    internalContribution: number,
    externalContribution: number,
  ): AwarenessReason {
    const threshold = this.config.awarenessThreshold;

    if (spontaneousEvent && jumpMagnitude > threshold) {
      return 'spontaneous_internal_change';
    }
    if (internalContribution > externalContribution && internalContribution > threshold) {
      return 'dominant_internal_change';
    }
    return 'none';
  }
}
