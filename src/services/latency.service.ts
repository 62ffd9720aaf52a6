import { setTimeout as sleep } from 'timers/promises';
import type { RandomSource } from '../types/index';

export type LatencyProfile = 'read' | 'write' | 'heavy' | 'lookup' | 'inference';

/** Seconds, [min, max). */
export const LATENCY_RANGES: Record<LatencyProfile, [number, number]> = {
  read: [0.05, 0.2],
  write: [0.1, 0.3],
  heavy: [0.3, 0.8],
  lookup: [0.05, 0.5],
  inference: [0.1, 59.0],
};

export interface LatencySimulator {
  /** Waits a random time drawn from the profile and returns it in seconds. */
  wait(profile: LatencyProfile): Promise<number>;
}

export function uniform(random: RandomSource, min: number, max: number): number {
  return min + random() * (max - min);
}

export function createLatencySimulator(random: RandomSource = Math.random): LatencySimulator {
  return {
    async wait(profile) {
      const [min, max] = LATENCY_RANGES[profile];
      const seconds = uniform(random, min, max);
      await sleep(seconds * 1000);
      return seconds;
    },
  };
}

/** Resolves immediately; the reported time is still drawn from the profile. */
export function createInstantLatencySimulator(random: RandomSource = Math.random): LatencySimulator {
  return {
    async wait(profile) {
      const [min, max] = LATENCY_RANGES[profile];
      return uniform(random, min, max);
    },
  };
}
