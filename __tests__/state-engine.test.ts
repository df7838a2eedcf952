import { describe, it, expect, beforeEach } from 'vitest';
import { StateEngine } from '../src/consciousness/engine';
import { createRandomSource } from '../src/consciousness/random';
import { ConfigurationError } from '../src/core/errors';
import { Snapshot } from '../src/core/types';
import { constantRandom } from './helpers';

describe('StateEngine', () => {
  describe('configuration', () => {
    it('should accept the defaults', () => {
      const engine = new StateEngine();
      expect(engine.config.baseFrequency).toBe(0.15);
      expect(engine.config.echoLifetime).toBe(30);
    });

    it('should reject a negative echo lifetime', () => {
      expect(() => new StateEngine({ echoLifetime: -1 })).toThrow(ConfigurationError);
    });

    it('should name the offending field', () => {
      try {
        new StateEngine({ spontaneousEventProbability: 1.5 });
        expect.fail('expected a ConfigurationError');
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigurationError);
        if (err instanceof ConfigurationError) {
          expect(err.field).toBe('spontaneousEventProbability');
          expect(err.code).toBe('INVALID_CONFIG');
        }
      }
    });

    it('should reject a zero base frequency and a zero threshold', () => {
      expect(() => new StateEngine({ baseFrequency: 0 })).toThrow(ConfigurationError);
      expect(() => new StateEngine({ awarenessThreshold: 0 })).toThrow(ConfigurationError);
    });

    it('should allow zero noise and zero variability', () => {
      expect(() => new StateEngine({ noiseAmplitude: 0, internalVariability: 0 })).not.toThrow();
    });
  });

  describe('tick()', () => {
    let engine: StateEngine;

    beforeEach(() => {
      // 0.5 makes every uniform draw centered: no noise, no drift, no events
      engine = new StateEngine({}, { random: constantRandom(0.5) });
    });

    it('should start with a centered pulse on the first tick', () => {
      const snap = engine.tick(null, false, 0);
      expect(snap.tick).toBe(1);
      expect(snap.pulse).toBe(0.5);
      expect(snap.irregularRhythm).toBe(false);
      expect(snap.reason).toBe('none');
    });

    it('should advance the rhythm phase with elapsed time', () => {
      engine.tick(null, false, 0);
      const snap = engine.tick(null, false, 1000);
      expect(snap.pulse).toBeCloseTo(0.5 + Math.sin(0.15) / 2, 10);
      expect(engine.getState().phase).toBeCloseTo(0.15, 10);
    });

    it('should flag a tick where noise dominates the rhythm', () => {
      const noisy = new StateEngine({}, { random: constantRandom(0.9) });
      const snap = noisy.tick(null, false, 0);
      // noise = 0.8 * 0.6 = 0.48 against a rhythm of sin(0) = 0
      expect(snap.pulse).toBeCloseTo(0.74, 10);
      expect(snap.irregularRhythm).toBe(true);
    });

    it('should raise attention by a fraction of the gap and tilt the phase', () => {
      const first = engine.tick(0, true, 0);
      expect(first.attentionLevel).toBeCloseTo(0.4, 10);
      expect(engine.getState().phaseBias).toBeCloseTo(0.045, 10);

      const second = engine.tick(0, true, 1000);
      expect(second.attentionLevel).toBeCloseTo(0.64, 10);
    });

    it('should decay attention exponentially with elapsed time', () => {
      engine.tick(0, true, 0);
      const oneSecond = engine.tick(null, false, 1000);
      expect(oneSecond.attentionLevel).toBeCloseTo(0.36, 10);

      const threeMore = engine.tick(null, false, 4000);
      expect(threeMore.attentionLevel).toBeCloseTo(0.36 * 0.9 ** 3, 10);
    });

    it('should clamp external input to the configured limit', () => {
      expect(engine.tick(5, false, 0).externalSignal).toBe(1);
      expect(engine.tick(-5, false, 1000).externalSignal).toBe(-1);
      expect(engine.tick(Number.NaN, false, 2000).externalSignal).toBe(0);

      const intense = new StateEngine({ externalSignalLimit: 1.5 }, { random: constantRandom(0.5) });
      expect(intense.tick(9, false, 0).externalSignal).toBe(1.5);
      expect(intense.tick(-0.7, false, 1000).externalSignal).toBe(-0.7);
    });

    it('should compute total state, delta and smoothed direction', () => {
      const a = engine.tick(1, false, 0);
      expect(a.totalState).toBe(1);
      expect(a.delta).toBe(1);
      expect(a.direction).toBeCloseTo(0.3, 10);

      const b = engine.tick(1, false, 1000);
      expect(b.delta).toBe(0);
      expect(b.direction).toBeCloseTo(0.21, 10);

      const c = engine.tick(0, false, 2000);
      expect(c.delta).toBe(-1);
      expect(c.direction).toBeCloseTo(-0.153, 10);
    });

    it('should treat null input as no contribution', () => {
      const snap = engine.tick(null, false, 0);
      expect(snap.externalSignal).toBe(0);
      expect(snap.totalState).toBe(snap.internalState);
    });
  });

  describe('clock policy', () => {
    it('should treat time running backwards as zero elapsed time', () => {
      const engine = new StateEngine({}, { random: constantRandom(0.5) });
      engine.tick(0, true, 5000);
      const phaseBefore = engine.getState().phase;

      const backwards = engine.tick(null, false, 3000);
      expect(backwards.time).toBe(5000);
      expect(backwards.attentionLevel).toBeCloseTo(0.4, 10);
      expect(engine.getState().phase).toBe(phaseBefore);
      expect(engine.getState().lastTime).toBe(5000);

      const forward = engine.tick(null, false, 6000);
      expect(forward.attentionLevel).toBeCloseTo(0.36, 10);
    });

    it('should accept repeated timestamps', () => {
      const engine = new StateEngine({}, { random: constantRandom(0.5) });
      engine.tick(null, false, 1000);
      const again = engine.tick(null, false, 1000);
      expect(again.tick).toBe(2);
      expect(again.time).toBe(1000);
    });
  });

  describe('echo traces', () => {
    it('should hold one echo after an attention pulse and purge it after its lifetime', () => {
      const engine = new StateEngine({ echoLifetime: 3 }, { random: constantRandom(0.5) });

      const pulse = engine.tick(0, true, 0);
      expect(pulse.echoCount).toBe(1);

      const counts: number[] = [];
      for (let i = 1; i <= 5; i++) {
        counts.push(engine.tick(null, false, i * 1000).echoCount);
      }
      expect(counts).toEqual([1, 1, 0, 0, 0]);
    });

    it('should record creation tick and remaining lifetime', () => {
      const engine = new StateEngine({ echoLifetime: 3 }, { random: constantRandom(0.5) });
      engine.tick(null, false, 0);
      engine.tick(0, true, 1000);
      engine.tick(null, false, 2000);

      const traces = engine.getState().echoTraces;
      expect(traces).toHaveLength(1);
      expect(traces[0].createdAtTick).toBe(2);
      expect(traces[0].remainingLifetime).toBe(2);
      expect(traces[0].strength).toBeCloseTo(0.4, 10);
    });

    it('should count exactly the traces younger than the lifetime', () => {
      const lifetimeMs = 2500;
      const engine = new StateEngine({ echoLifetime: lifetimeMs / 1000 }, { random: createRandomSource('echo-seed') });
      const choose = createRandomSource('attention-pattern');
      const attentiveAt: number[] = [];

      for (let i = 0; i < 60; i++) {
        const now = i * 1000;
        const attention = choose() < 0.4;
        if (attention) attentiveAt.push(now);

        const snap = engine.tick(attention ? 0.2 : null, attention, now);
        const expected = attentiveAt.filter(t => now - t < lifetimeMs).length;
        expect(snap.echoCount).toBe(expected);
        expect(engine.getState().echoTraces).toHaveLength(expected);
      }
    });

    it('should stay empty when no attention is ever given', () => {
      const engine = new StateEngine({}, { random: createRandomSource('idle') });
      const attention: number[] = [];

      for (let i = 0; i < 10; i++) {
        const snap = engine.tick(null, false, i * 1000);
        expect(snap.echoCount).toBe(0);
        attention.push(snap.attentionLevel);
      }

      expect(attention.every(level => level === 0)).toBe(true);
    });
  });

  describe('acts of awareness', () => {
    it('should classify every tick as spontaneous when events are forced', () => {
      // 0.9 → jump of 0.8 every tick, well above the threshold
      const engine = new StateEngine(
        { spontaneousEventProbability: 1.0, awarenessThreshold: 0.1 },
        { random: constantRandom(0.9) },
      );

      for (let i = 1; i <= 10; i++) {
        const snap = engine.tick(null, false, i * 1000);
        expect(snap.actOfAwareness).toBe(true);
        expect(snap.spontaneousEvent).toBe(true);
        expect(snap.reason).toBe('spontaneous_internal_change');
        expect(snap.actsOfAwarenessTotal).toBe(snap.tick);
      }
    });

    it('should let a large spontaneous jump win even against a strong signal', () => {
      const engine = new StateEngine(
        { spontaneousEventProbability: 1.0, internalVariability: 0, awarenessThreshold: 0.4 },
        { random: constantRandom(0.9) },
      );
      const snap = engine.tick(1, true, 0);
      expect(snap.reason).toBe('spontaneous_internal_change');
    });

    it('should not count a spontaneous jump below the threshold', () => {
      // 0.6 → jump of 0.2 against a threshold of 0.4
      const engine = new StateEngine(
        { spontaneousEventProbability: 1.0, internalVariability: 0, awarenessThreshold: 0.4 },
        { random: constantRandom(0.6) },
      );
      const snap = engine.tick(null, false, 0);
      expect(snap.spontaneousEvent).toBe(true);
      expect(snap.actOfAwareness).toBe(false);
      expect(snap.reason).toBe('none');
      expect(snap.actsOfAwarenessTotal).toBe(0);
    });

    it('should never find dominance when the internal state does not move', () => {
      const engine = new StateEngine(
        { internalVariability: 0, spontaneousEventProbability: 0, awarenessThreshold: 0.01 },
        { random: constantRandom(0.9) },
      );

      for (const input of [null, 0, 0.5, -1, 1]) {
        const snap = engine.tick(input, false, 0);
        expect(snap.actOfAwareness).toBe(false);
        expect(snap.reason).toBe('none');
      }
      expect(engine.peek().actsOfAwarenessTotal).toBe(0);
    });

    describe('dominant internal change', () => {
      // 0.9 → drift of 0.4 * internalVariability = 0.8
      const make = () => new StateEngine(
        { internalVariability: 2, spontaneousEventProbability: 0, awarenessThreshold: 0.4 },
        { random: constantRandom(0.9) },
      );

      it('should fire when drift beats a quiet outside world', () => {
        const snap = make().tick(null, false, 0);
        expect(snap.internalState).toBeCloseTo(0.8, 10);
        expect(snap.reason).toBe('dominant_internal_change');
        expect(snap.actsOfAwarenessTotal).toBe(1);
      });

      it('should fire when drift beats a weaker signal', () => {
        expect(make().tick(0.5, true, 0).reason).toBe('dominant_internal_change');
      });

      it('should not fire when the signal is stronger', () => {
        const snap = make().tick(1, true, 0);
        expect(snap.actOfAwareness).toBe(false);
        expect(snap.reason).toBe('none');
      });

      it('should not fire below the threshold', () => {
        const engine = new StateEngine(
          { internalVariability: 2, spontaneousEventProbability: 0, awarenessThreshold: 0.9 },
          { random: constantRandom(0.9) },
        );
        expect(engine.tick(null, false, 0).reason).toBe('none');
      });
    });
  });

  describe('invariants over long runs', () => {
    it('should keep pulse and attention bounded and counters monotonic under adversarial input', () => {
      const engine = new StateEngine(
        { noiseAmplitude: 5, internalVariability: 3, spontaneousEventProbability: 0.5 },
        { random: createRandomSource('adversarial') },
      );
      let previous: Snapshot | null = null;

      for (let i = 0; i < 500; i++) {
        const input = i % 3 === 0 ? 1e9 : i % 3 === 1 ? -1e9 : null;
        const snap = engine.tick(input, i % 2 === 0, i * 250);

        expect(snap.tick).toBe(i + 1);
        expect(snap.pulse).toBeGreaterThanOrEqual(0);
        expect(snap.pulse).toBeLessThanOrEqual(1);
        expect(snap.attentionLevel).toBeGreaterThanOrEqual(0);
        expect(snap.attentionLevel).toBeLessThanOrEqual(1);
        expect(Math.abs(snap.externalSignal)).toBeLessThanOrEqual(1);

        const before = previous ? previous.actsOfAwarenessTotal : 0;
        expect(snap.actsOfAwarenessTotal - before).toBe(snap.actOfAwareness ? 1 : 0);
        previous = snap;
      }
    });

    it('should reproduce a run from the same seed', () => {
      const run = (): Snapshot[] => {
        const engine = new StateEngine({}, { random: createRandomSource('replay') });
        return Array.from({ length: 20 }, (_, i) => engine.tick(i % 4 === 0 ? 0.3 : null, i % 4 === 0, i * 1000));
      };
      expect(run()).toEqual(run());
    });
  });

  describe('snapshots', () => {
    it('should return a zeroed snapshot before the first tick', () => {
      const snap = new StateEngine().peek();
      expect(snap.tick).toBe(0);
      expect(snap.reason).toBe('none');
      expect(snap.echoCount).toBe(0);
    });

    it('should peek at the latest snapshot without advancing', () => {
      const engine = new StateEngine({}, { random: constantRandom(0.5) });
      const snap = engine.tick(0.2, true, 0);
      expect(engine.peek()).toBe(snap);
      expect(engine.peek().tick).toBe(1);
    });

    it('should freeze snapshots and keep old ones unchanged', () => {
      const engine = new StateEngine({}, { random: constantRandom(0.5) });
      const first = engine.tick(0.2, true, 0);
      engine.tick(-0.2, false, 1000);

      expect(Object.isFrozen(first)).toBe(true);
      expect(first.tick).toBe(1);
      expect(first.externalSignal).toBe(0.2);
      expect(first.echoCount).toBe(1);
    });

    it('should hand out state copies that do not alias the engine', () => {
      const engine = new StateEngine({}, { random: constantRandom(0.5) });
      engine.tick(0, true, 0);

      const copy = engine.getState();
      copy.echoTraces[0].remainingLifetime = -100;
      copy.echoTraces.push({ createdAtTick: 99, remainingLifetime: 1, strength: 1 });
      copy.tickCount = 42;

      const fresh = engine.getState();
      expect(fresh.echoTraces).toHaveLength(1);
      expect(fresh.echoTraces[0].remainingLifetime).toBe(30);
      expect(fresh.tickCount).toBe(1);
    });
  });
});
