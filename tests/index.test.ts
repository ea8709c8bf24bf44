import * as api from '../src';

describe('package entry point', () => {
  it('exposes every technique and algorithm', () => {
    expect(api.activeFeatures({ featureA: false, featureB: true, featureC: false })).toEqual(['B']);
    expect(api.processValue(-1)).toBe('failure');
    expect(api.tracePath(4)).toEqual(['positive', 'even']);
    expect(api.checkRange(50)).toBe('success');
    expect(api.evaluateCombination(4, true)).toBe('success');
    expect(api.isSorted([3, 2])).toBe(false);
    expect(api.classifyNumber(-3)).toBe('Negative-Odd');
    expect(api.factorial(5)).toBe(120);
    expect(api.fibonacci(7)).toBe(13);
    expect(api.isPrime(17)).toBe(true);
  });

  it('exposes the runner pieces', () => {
    expect(api.DEMONSTRATIONS).toHaveLength(10);
    expect(api.SECTION_SEPARATOR).toBe('=======================');
    expect(api.statusOf(false)).toBe('failure');
    expect(new api.InvalidInputError('x', -2)).toBeInstanceOf(Error);
  });
});
