/**
 * Rate Gate Tests
 */

import { describe, it, expect, vi } from 'vitest';

import { createRateGate } from '@/orchestrator/rate-gate.js';

describe('Rate Gate', () => {
  function fakeClock(start = 1000) {
    let time = start;
    const sleep = vi.fn(async (ms: number) => {
      time += ms;
    });
    return {
      now: () => time,
      advance: (ms: number) => {
        time += ms;
      },
      sleep,
    };
  }

  it('lets the first call through immediately', async () => {
    const clock = fakeClock();
    const gate = createRateGate({ minIntervalMs: 1000, ...clock });

    await gate.wait();

    expect(clock.sleep).not.toHaveBeenCalled();
  });

  it('sleeps for the rest of the interval on the next call', async () => {
    const clock = fakeClock();
    const gate = createRateGate({ minIntervalMs: 1000, ...clock });

    await gate.wait();
    clock.advance(300);
    await gate.wait();

    expect(clock.sleep).toHaveBeenCalledWith(700);
  });

  it('does not sleep once the interval has passed', async () => {
    const clock = fakeClock();
    const gate = createRateGate({ minIntervalMs: 1000, ...clock });

    await gate.wait();
    clock.advance(1500);
    await gate.wait();

    expect(clock.sleep).not.toHaveBeenCalled();
  });

  it('measures from the previous release', async () => {
    const clock = fakeClock();
    const gate = createRateGate({ minIntervalMs: 1000, ...clock });

    await gate.wait();
    await gate.wait(); // sleeps 1000, released at 2000
    clock.advance(400);
    await gate.wait();

    expect(clock.sleep.mock.calls).toEqual([[1000], [600]]);
  });

  it('never sleeps with a zero interval', async () => {
    const clock = fakeClock();
    const gate = createRateGate({ minIntervalMs: 0, ...clock });

    await gate.wait();
    await gate.wait();

    expect(clock.sleep).not.toHaveBeenCalled();
  });
});
