/**
 * Rate Gate
 *
 * Minimum-interval gate for tool invocations: the first wait() returns at
 * once, each later one resolves no sooner than minIntervalMs after the
 * previous release.
 */

import { setTimeout as sleepFor } from 'node:timers/promises';

export interface RateGate {
  wait(): Promise<void>;
}

export interface RateGateOptions {
  minIntervalMs: number;
  /** Clock in ms; defaults to Date.now */
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export function createRateGate(options: RateGateOptions): RateGate {
  const {
    minIntervalMs,
    now = () => Date.now(),
    sleep = async (ms: number) => {
      await sleepFor(ms);
    },
  } = options;

  let lastRelease: number | null = null;

  return {
    async wait(): Promise<void> {
      if (lastRelease !== null) {
        const remaining = minIntervalMs - (now() - lastRelease);
        if (remaining > 0) {
          await sleep(remaining);
        }
      }
      lastRelease = now();
    },
  };
}
