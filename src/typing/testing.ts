/**
 * Deterministic stand-ins for tests
 */

import type { RandomSource } from './random';
import type { Clock } from './session';

export interface ManualClock extends Clock {
  advance(ms: number): void;
}

export function createManualClock(start = 1000): ManualClock {
  let time = start;
  return {
    now: () => time,
    advance: (ms) => { time += ms; },
  };
}

/**
 * Always picks the lowest allowed value, so sampling keeps corpus order
 */
export const firstPick: RandomSource = {
  float: () => 0,
  int: (min) => min,
};

/**
 * Always picks the highest allowed value
 */
export const lastPick: RandomSource = {
  float: () => 0.999999,
  int: (_min, max) => max,
};
