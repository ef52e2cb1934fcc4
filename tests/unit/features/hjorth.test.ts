import { describe, it, expect } from 'vitest';
import { hjorthParameters } from '../../../src/signal/features/hjorth';
import { generateSineWave } from '../../../src/signal/synthetic';

describe('hjorthParameters', () => {
  it('should return activity 2 and zero mobility for a linear ramp', () => {
    expect(hjorthParameters([1, 2, 3, 4, 5])).toEqual({ activity: 2, mobility: 0, complexity: 0 });
  });

  it('should return zeros for a constant signal', () => {
    expect(hjorthParameters([7, 7, 7, 7])).toEqual({ activity: 0, mobility: 0, complexity: 0 });
  });

  it('should give mobility 2·sin(πf/fs) and complexity 1 for a sine', () => {
    const { activity, mobility, complexity } = hjorthParameters(generateSineWave(10, 250, 10, 1));

    expect(activity).toBeCloseTo(0.5, 6);
    expect(mobility).toBeCloseTo(2 * Math.sin(Math.PI / 25), 3);
    expect(complexity).toBeCloseTo(1, 2);
  });

  it('should not fail on a single sample', () => {
    expect(hjorthParameters([3])).toEqual({ activity: 0, mobility: 0, complexity: 0 });
  });
});
