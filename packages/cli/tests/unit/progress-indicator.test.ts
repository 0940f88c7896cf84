/**
 * Unit tests for the progress indicator
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  ProgressIndicator,
  createProgressBar,
  formatElapsedTime,
  getProgressIndicator,
  resetProgressIndicator,
} from '../../src/core/progress-indicator.js';

function fakeStream(isTTY: boolean) {
  return { isTTY, columns: 10, write: vi.fn() };
}

describe('ProgressIndicator', () => {
  afterEach(() => {
    vi.useRealTimers();
    resetProgressIndicator();
  });

  it('should draw nothing when the stream is not a terminal', () => {
    const stream = fakeStream(false);
    const progress = new ProgressIndicator(stream);

    progress.start('Working');
    progress.updateMessage('Still working');
    progress.fail('boom');

    expect(progress.active).toBe(false);
    expect(stream.write).not.toHaveBeenCalled();
  });

  it('should animate, redraw on new messages and clear the line', () => {
    vi.useFakeTimers();
    const stream = fakeStream(true);
    const progress = new ProgressIndicator(stream);

    progress.start('Working');
    vi.advanceTimersByTime(100);
    progress.updateMessage('Iteration 2/3');
    progress.stop();
    vi.advanceTimersByTime(500);

    expect(stream.write.mock.calls.map((call) => call[0])).toEqual([
      '\r⠋ Working',
      '\r⠙ Working',
      '\r⠙ Iteration 2/3',
      `\r${' '.repeat(10)}\r`,
    ]);
    expect(progress.active).toBe(false);
  });

  it('should print the failure message after stopping', () => {
    vi.useFakeTimers();
    const stream = fakeStream(true);
    const progress = new ProgressIndicator(stream);

    progress.start('Working');
    progress.fail('Error occurred');

    expect(stream.write).toHaveBeenLastCalledWith('✗ Error occurred\n');
  });

  it('should share one indicator until reset', () => {
    const first = getProgressIndicator();
    expect(getProgressIndicator()).toBe(first);

    resetProgressIndicator();
    expect(getProgressIndicator()).not.toBe(first);
  });
});

describe('createProgressBar', () => {
  it('should fill in proportion to progress', () => {
    expect(createProgressBar(1, 2, 4)).toBe('[██░░] 50% (1/2)');
    expect(createProgressBar(3, 3, 2)).toBe('[██] 100% (3/3)');
  });

  it('should draw an empty bar when there is nothing to do', () => {
    expect(createProgressBar(0, 0, 3)).toBe('[   ] 0%');
  });
});

describe('formatElapsedTime', () => {
  it('should pick a unit for the magnitude', () => {
    expect(formatElapsedTime(850)).toBe('850ms');
    expect(formatElapsedTime(1500)).toBe('1.5s');
    expect(formatElapsedTime(125_000)).toBe('2m 5s');
  });
});
