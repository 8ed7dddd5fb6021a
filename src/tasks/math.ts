/**
 * CPU-bound tasks run by worker processes.
 *
 * Exports are plain functions taking JSON arguments; the worker imports this
 * module by URL and calls them by name.
 */

const requireCount = (value: unknown, label: string): number => {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new Error(`${label} must be a non-negative integer`)
  }
  return value
}

/** Number of primes strictly below `limit` (sieve of Eratosthenes) */
export const countPrimes = (limit: unknown): number => {
  const n = requireCount(limit, "limit")
  if (n < 3) return 0
  const composite = new Uint8Array(n)
  let count = 0
  for (let i = 2; i < n; i++) {
    if (composite[i] === 1) continue
    count++
    for (let j = i * i; j < n; j += i) composite[j] = 1
  }
  return count
}

/** n-th Fibonacci number, as a string since it outgrows doubles */
export const fibonacci = (index: unknown): string => {
  const n = requireCount(index, "index")
  let a = 0n
  let b = 1n
  for (let i = 0; i < n; i++) {
    const next = a + b
    a = b
    b = next
  }
  return a.toString()
}
