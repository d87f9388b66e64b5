/**
 * Timing utilities for performance testing
 */

import { performance } from "node:perf_hooks";

/**
 * High-resolution clock using performance.now()
 */
export const clock = {
  /**
   * Measure execution time of a synchronous function
   * @param fn - Function to measure
   * @returns Tuple of [result, duration in ms]
   */
  measure<T>(fn: () => T): [T, number] {
    const start = performance.now();
    const result = fn();
    return [result, performance.now() - start];
  },

  /**
   * Run `fn` `iterations` times and report per-call statistics
   * @returns Mean and p95 duration in milliseconds
   */
  sample(fn: (i: number) => void, iterations: number): { meanMs: number; p95Ms: number } {
    const samples: number[] = [];
    for (let i = 0; i < iterations; i++) {
      const start = performance.now();
      fn(i);
      samples.push(performance.now() - start);
    }
    if (samples.length === 0) {
      return { meanMs: 0, p95Ms: 0 };
    }
    samples.sort((a, b) => a - b);
    const mean = samples.reduce((sum, ms) => sum + ms, 0) / samples.length;
    const p95 = samples[Math.max(0, Math.ceil(samples.length * 0.95) - 1)] ?? 0;
    return { meanMs: mean, p95Ms: p95 };
  },
};
