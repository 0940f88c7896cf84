/**
 * Source of wall-clock time for run durations, seeds and archive names
 */
export interface ClockPort {
  nowMs(): number;
}

/**
 * Wall clock. Composition roots call this; everything below them takes an
 * injected clock so archive timestamps can be pinned.
 */
export function createSystemClock(): ClockPort {
  return { nowMs: () => Date.now() };
}

/**
 * Clock that returns a fixed instant, optionally advancing by a step on
 * every read
 */
export function createFixedClock(startMs: number, stepMs: number = 0): ClockPort {
  let current = startMs;
  return {
    nowMs: () => {
      const value = current;
      current += stepMs;
      return value;
    },
  };
}
