/**
 * Timing loop for the highlighting benchmarks.
 */

export interface Benchmark {
  name: string;
  setup?: () => void;
  fn: () => void;
  teardown?: () => void;
  iterations: number;
  /** Average must stay under this, in ms */
  targetMs?: number;
}

export interface Timing {
  name: string;
  avgMs: number;
  maxMs: number;
  passed: boolean;
}

export function measure(bench: Benchmark): Timing {
  bench.setup?.();
  try {
    // Warm up JIT and the parser's allocations.
    for (let i = 0; i < Math.max(5, bench.iterations >> 3); i++) bench.fn();

    let total = 0;
    let maxMs = 0;
    for (let i = 0; i < bench.iterations; i++) {
      const start = performance.now();
      bench.fn();
      const elapsed = performance.now() - start;
      total += elapsed;
      maxMs = Math.max(maxMs, elapsed);
    }

    const avgMs = total / bench.iterations;
    return {
      name: bench.name,
      avgMs,
      maxMs,
      passed: bench.targetMs === undefined || avgMs <= bench.targetMs,
    };
  } finally {
    bench.teardown?.();
  }
}

export function formatTiming(timing: Timing, targetMs?: number): string {
  const status = timing.passed ? "✓" : "✗";
  const target = targetMs !== undefined ? ` (target: <${targetMs}ms)` : "";
  return `${status} ${timing.name}: avg ${timing.avgMs.toFixed(3)}ms, max ${timing.maxMs.toFixed(3)}ms${target}`;
}
