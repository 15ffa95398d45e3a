import type { StatisticalSummary } from './types.js';

// Two-sided 95% critical values of Student's t by degrees of freedom.
const T95: Record<number, number> = {
  1: 12.706, 2: 4.303, 3: 3.182, 4: 2.776, 5: 2.571,
  6: 2.447, 7: 2.365, 8: 2.306, 9: 2.262, 10: 2.228,
  15: 2.131, 20: 2.086, 25: 2.060, 30: 2.042, 40: 2.021,
  50: 2.009, 60: 2.000, 80: 1.990, 100: 1.984, 120: 1.980,
};
const T95_DFS = Object.keys(T95).map(Number).sort((a, b) => a - b);

export function tValue95(df: number): number {
  if (df > 120) return 1.96;
  let closest = T95_DFS[0];
  for (const d of T95_DFS) {
    if (d <= df) closest = d;
    else break;
  }
  return T95[closest];
}

export function summarize(samples: readonly number[]): StatisticalSummary {
  const n = samples.length;
  if (n === 0) {
    return { n: 0, mean: 0, median: 0, variance: 0, stdDev: 0, min: 0, max: 0, confidenceInterval: [0, 0] };
  }

  const sorted = [...samples].sort((a, b) => a - b);
  const mean = samples.reduce((a, b) => a + b, 0) / n;
  const median = n % 2 === 0 ? (sorted[n / 2 - 1] + sorted[n / 2]) / 2 : sorted[Math.floor(n / 2)];
  // Sample variance; 0 for a single observation.
  const variance = n > 1 ? samples.reduce((sum, x) => sum + Math.pow(x - mean, 2), 0) / (n - 1) : 0;
  const stdDev = Math.sqrt(variance);
  const margin = tValue95(Math.max(1, n - 1)) * (stdDev / Math.sqrt(n));

  return {
    n,
    mean,
    median,
    variance,
    stdDev,
    min: sorted[0],
    max: sorted[n - 1],
    confidenceInterval: [mean - margin, mean + margin],
  };
}

/** Standard normal CDF (Abramowitz and Stegun 7.1.26). */
export function normalCdf(x: number): number {
  const a1 = 0.254829592;
  const a2 = -0.284496736;
  const a3 = 1.421413741;
  const a4 = -1.453152027;
  const a5 = 1.061405429;
  const p = 0.3275911;

  const sign = x < 0 ? -1 : 1;
  const z = Math.abs(x) / Math.SQRT2;
  const t = 1 / (1 + p * z);
  const y = 1 - ((((a5 * t + a4) * t + a3) * t + a2) * t + a1) * t * Math.exp(-z * z);
  return 0.5 * (1 + sign * y);
}

function twoTailedP(t: number, df: number): number {
  const adjusted = df > 100 ? t : t * Math.sqrt(df / (df + t * t));
  return Math.min(1, Math.max(0, 2 * (1 - normalCdf(Math.abs(adjusted)))));
}

export interface WelchResult {
  tStatistic: number;
  degreesOfFreedom: number;
  pValue: number;
}

export function welchTTest(baseline: readonly number[], candidate: readonly number[]): WelchResult {
  const a = summarize(baseline);
  const b = summarize(candidate);
  if (a.n < 2 || b.n < 2) return { tStatistic: 0, degreesOfFreedom: 0, pValue: 1 };

  const va = a.variance / a.n;
  const vb = b.variance / b.n;
  const se = Math.sqrt(va + vb);
  if (se === 0) {
    return { tStatistic: 0, degreesOfFreedom: a.n + b.n - 2, pValue: b.mean === a.mean ? 1 : 0 };
  }

  const t = (b.mean - a.mean) / se;
  const dfDenominator = Math.pow(va, 2) / (a.n - 1) + Math.pow(vb, 2) / (b.n - 1);
  const df = dfDenominator > 0 ? Math.pow(va + vb, 2) / dfDenominator : 1;
  return { tStatistic: t, degreesOfFreedom: df, pValue: twoTailedP(t, df) };
}

/** Cohen's d with pooled standard deviation; 0 when it cannot be computed. */
export function cohensD(baseline: readonly number[], candidate: readonly number[]): number {
  const a = summarize(baseline);
  const b = summarize(candidate);
  if (a.n + b.n <= 2) return 0;
  const pooled = Math.sqrt(((a.n - 1) * a.variance + (b.n - 1) * b.variance) / (a.n + b.n - 2));
  return pooled > 0 ? (b.mean - a.mean) / pooled : 0;
}
