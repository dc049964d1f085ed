import type { Histogram } from "../domain/histogram/Histogram";

const UNITS = [
  { suffix: "ns", scale: 1 },
  { suffix: "µs", scale: 1e3 },
  { suffix: "ms", scale: 1e6 },
  { suffix: "s", scale: 1e9 },
] as const;

/** Formats nanoseconds with three significant figures, e.g. `1.50µs`. */
export function formatDuration(ns: number): string {
  if (!Number.isFinite(ns)) return `${ns}ns`;
  const sign = ns < 0 ? "-" : "";
  const abs = Math.abs(ns);
  if (Math.round(abs) < 1e3) return `${sign}${Math.round(abs)}ns`;

  const last = UNITS.length - 1;
  for (let i = 1; i < last; i++) {
    const text = (abs / UNITS[i].scale).toPrecision(3);
    // 999.96µs rounds up to "1.00e+3" and belongs to the next unit.
    if (Number(text) < 1e3) return `${sign}${text}${UNITS[i].suffix}`;
  }
  const seconds = abs / UNITS[last].scale;
  const text = seconds < 999.5 ? seconds.toPrecision(3) : seconds.toFixed(0);
  return `${sign}${text}${UNITS[last].suffix}`;
}

export interface RenderOptions {
  barWidth?: number;
}

export function renderHistogram(histogram: Histogram, options: RenderOptions = {}): string {
  const barWidth = options.barWidth ?? 40;
  const f = formatDuration;
  const lines = [
    `avg ${f(histogram.average)}; min ${f(histogram.minimum)}; p50 ${f(histogram.p50)}; max ${f(histogram.maximum)};`,
    `p90 ${f(histogram.p90)}; p99 ${f(histogram.p99)}; p999 ${f(histogram.p999)}; p9999 ${f(histogram.p9999)};`,
  ];

  const starts = histogram.bins.map((bin) => f(bin.start));
  const counts = histogram.bins.map((bin) => String(bin.count));
  const startWidth = Math.max(0, ...starts.map((s) => s.length));
  const countWidth = Math.max(0, ...counts.map((s) => s.length));
  const maxCount = Math.max(0, ...histogram.bins.map((bin) => bin.count));

  histogram.bins.forEach((bin, i) => {
    const bar = maxCount > 0 ? "#".repeat(Math.round((bin.count / maxCount) * barWidth)) : "";
    const marker = bin.andAbove ? "+" : " ";
    const line = `${starts[i].padStart(startWidth)} ${marker}[${counts[i].padStart(countWidth)}] ${bar}`;
    lines.push(line.trimEnd());
  });

  return lines.join("\n");
}
