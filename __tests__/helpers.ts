import { Clock, RandomSource } from '../src/core/types';

/** Always returns the same draw */
export function constantRandom(value: number): RandomSource {
  return () => value;
}

/** Clock that advances by stepMs every time it is read */
export function steppingClock(startMs: number = 0, stepMs: number = 1000): Clock {
  let now = startMs - stepMs;
  return () => {
    now += stepMs;
    return now;
  };
}
