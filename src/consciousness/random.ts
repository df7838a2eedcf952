/**
 * Random Source — the engine's only contact with chance
 *
 * Every stochastic step draws from an injected RandomSource rather than
 * Math.random, so a seed reproduces a whole run and tests can script
 * the exact branch they want (a forced spontaneous event, zero noise).
 */

import seedrandom from 'seedrandom';
import { RandomSource } from '../core/types';

/**
 * Create a random source. With a seed the sequence is reproducible;
 * without one seedrandom mixes in local entropy.
 */
export function createRandomSource(seed?: string): RandomSource {
  const prng = seedrandom(seed);
  return () => prng();
}

/** Uniform sample in [min, max) */
export function uniform(random: RandomSource, min: number, max: number): number {
  return min + random() * (max - min);
}
