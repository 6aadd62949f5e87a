/**
 * Metric-prefix number parsing for console and form input: "5u" → 5e-6, "100ms" → 0.1.
 */

/** SI prefixes accepted after the number. Case-sensitive: M is mega, m is milli. */
export const METRIC_PREFIXES: Readonly<Record<string, number>> = {
  T: 1e12,
  G: 1e9,
  M: 1e6,
  k: 1e3,
  m: 1e-3,
  u: 1e-6,
  "µ": 1e-6,
  n: 1e-9,
  p: 1e-12,
  f: 1e-15,
};

const VALUE_PATTERN = /^([0-9]*\.?[0-9]+(?:[eE][+-]?[0-9]+)?)\s*([TGMkmuµnpf]?)\s*(W|s|Hz)?$/;

export type MetricParseResult = { ok: true; value: number } | { ok: false; error: string };

export function parseMetricValue(text: string): MetricParseResult {
  const trimmed = text.trim().replace("μ", "µ");
  const match = VALUE_PATTERN.exec(trimmed);
  if (!match) return { ok: false, error: `Invalid value format: "${text.trim()}"` };
  const num = Number(match[1]);
  const scale = match[2] ? METRIC_PREFIXES[match[2]] : 1;
  if (scale === undefined || !Number.isFinite(num)) {
    return { ok: false, error: `Invalid value format: "${text.trim()}"` };
  }
  return { ok: true, value: num * scale };
}
