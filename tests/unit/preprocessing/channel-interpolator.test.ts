/**
 * Channel Interpolator Tests
 */

import { describe, it, expect } from 'vitest';
import {
  interpolateDeadChannels,
  nearestSurvivor,
  shouldInterpolate,
} from '../../../src/signal/preprocessing/channel-interpolator';
import { InsufficientDataError, ValidationError } from '../../../src/utils/errors';

describe('shouldInterpolate', () => {
  it('should require some but fewer than half of the channels to be dead', () => {
    expect(shouldInterpolate(0, 8)).toBe(false);
    expect(shouldInterpolate(1, 8)).toBe(true);
    expect(shouldInterpolate(3, 8)).toBe(true);
    expect(shouldInterpolate(4, 8)).toBe(false);
    expect(shouldInterpolate(5, 8)).toBe(false);
  });
});

describe('nearestSurvivor', () => {
  it('should pick the closest original index', () => {
    expect(nearestSurvivor(0, [2, 5])).toBe(2);
    expect(nearestSurvivor(4, [1, 6])).toBe(6);
  });

  it('should prefer the lower index on a tie', () => {
    expect(nearestSurvivor(2, [1, 3])).toBe(1);
  });
});

describe('interpolateDeadChannels', () => {
  it('should restore the original channel count', () => {
    const survivors = [
      [1, 1],
      [3, 3],
    ];
    const rebuilt = interpolateDeadChannels(survivors, [false, true, false, true]);

    expect(rebuilt).toEqual([
      [1, 1],
      [1, 1],
      [3, 3],
      [3, 3],
    ]);
  });

  it('should copy rather than alias the source channel', () => {
    const survivors = [[1, 2, 3]];
    const rebuilt = interpolateDeadChannels(survivors, [true, false]);

    expect(rebuilt[0]).toEqual([1, 2, 3]);
    expect(rebuilt[0]).not.toBe(survivors[0]);
    expect(rebuilt[0]).not.toBe(rebuilt[1]);
  });

  it('should leave a signal without dead channels unchanged', () => {
    expect(interpolateDeadChannels([[1], [2]], [false, false])).toEqual([[1], [2]]);
  });

  it('should fail when every channel is dead', () => {
    expect(() => interpolateDeadChannels([[1, 2]], [true, true])).toThrow(InsufficientDataError);
  });

  it('should fail when the mask does not match the surviving channels', () => {
    expect(() => interpolateDeadChannels([[1], [2]], [false, true, true])).toThrow(ValidationError);
  });
});
