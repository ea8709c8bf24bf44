import { InvalidInputError } from '../src/algorithms/errors';
import { fibonacci } from '../src/algorithms/fibonacci';

describe('fibonacci()', () => {
  it('matches the first six terms', () => {
    expect([0, 1, 2, 3, 4, 5].map(fibonacci)).toEqual([0, 1, 1, 2, 3, 5]);
  });

  it('computes larger indices', () => {
    expect(fibonacci(10)).toBe(55);
    expect(fibonacci(20)).toBe(6765);
  });

  it('follows the recurrence F(n) = F(n-1) + F(n-2)', () => {
    for (let n = 2; n <= 70; n++) {
      expect(fibonacci(n)).toBe(fibonacci(n - 1) + fibonacci(n - 2));
    }
  });

  it('throws InvalidInputError for negative input', () => {
    expect(() => fibonacci(-1)).toThrow(InvalidInputError);
    expect(() => fibonacci(-1)).toThrow('fibonacci() is not defined for negative input (-1)');
  });

  it('throws InvalidInputError for non-integers', () => {
    expect(() => fibonacci(1.5)).toThrow('fibonacci() expects an integer, received 1.5');
  });
});
