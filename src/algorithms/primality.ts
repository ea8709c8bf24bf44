/**
* Trial division over 6k ± 1. After ruling out multiples of 2 and 3 every
* prime candidate has that form, so the loop checks two divisors per step
* and stops at √n.
*/
export function isPrime(n: number): boolean {
  if (!Number.isInteger(n) || n <= 1) return false;
  if (n <= 3) return true;
  if (n % 2 === 0 || n % 3 === 0) return false;

  for (let i = 5; i * i <= n; i += 6) {
    if (n % i === 0 || n % (i + 2) === 0) return false;
  }
  return true;
}
