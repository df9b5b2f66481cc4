export interface RunStats {
  total: number;
  meanRps: number;
  p50: number;
  p99: number;
  non2xx: number;
  errors: number;
  timeouts: number;
}

export interface Expectation {
  label: string;
  /** Share of responses expected outside 2xx (tag misses answer 404). */
  expectedNon2xx: number;
  maxP99Ms: number;
}

export interface Verdict {
  scenario: string;
  "req/s": number;
  "p50 ms": number;
  "p99 ms": number;
  non2xx: string;
  errors: number;
  pass: boolean;
}

// Shuffled request lists cycle per connection, so the observed share drifts a little
export const NON2XX_TOLERANCE = 0.02;

export function judge(expectation: Expectation, stats: RunStats): Verdict {
  const non2xxShare = stats.total > 0 ? stats.non2xx / stats.total : 0;
  const non2xxOk = Math.abs(non2xxShare - expectation.expectedNon2xx) <= NON2XX_TOLERANCE;
  const latencyOk = stats.p99 <= expectation.maxP99Ms;
  const errorsOk = stats.errors === 0 && stats.timeouts === 0;

  return {
    scenario: expectation.label,
    "req/s": Math.round(stats.meanRps),
    "p50 ms": stats.p50,
    "p99 ms": stats.p99,
    non2xx: `${stats.non2xx} (${(non2xxShare * 100).toFixed(1)}%)`,
    errors: stats.errors + stats.timeouts,
    pass: stats.total > 0 && non2xxOk && latencyOk && errorsOk,
  };
}
