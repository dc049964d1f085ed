import { formatDuration, renderHistogram } from '../../src/app/HistogramRenderer';
import type { Histogram } from '../../src/domain/histogram/Histogram';

describe('formatDuration', () => {
  test('uses three significant figures in the closest unit', () => {
    expect(formatDuration(50)).toBe('50ns');
    expect(formatDuration(1500)).toBe('1.50µs');
    expect(formatDuration(12_300_000)).toBe('12.3ms');
    expect(formatDuration(2e9)).toBe('2.00s');
  });

  test('moves to the next unit when rounding reaches 1000', () => {
    expect(formatDuration(999.7)).toBe('1.00µs');
    expect(formatDuration(999_960)).toBe('1.00ms');
  });

  test('keeps the sign of negative durations', () => {
    expect(formatDuration(-2500)).toBe('-2.50µs');
  });
});

describe('renderHistogram', () => {
  const histogram: Histogram = {
    count: 3,
    minimum: 50,
    maximum: 70,
    average: 55,
    stdDev: 0,
    p50: 50,
    p90: 70,
    p99: 70,
    p999: 70,
    p9999: 70,
    bins: [
      { start: 50, width: 10, count: 2, andAbove: false },
      { start: 60, width: 10, count: 0, andAbove: false },
      { start: 70, width: 10, count: 1, andAbove: true },
    ],
  };

  test('prints summary lines followed by one bar per bin', () => {
    expect(renderHistogram(histogram, { barWidth: 4 }).split('\n')).toEqual([
      'avg 55ns; min 50ns; p50 50ns; max 70ns;',
      'p90 70ns; p99 70ns; p999 70ns; p9999 70ns;',
      '50ns  [2] ####',
      '60ns  [0]',
      '70ns +[1] ##',
    ]);
  });

  test('defaults to forty-character bars', () => {
    const lines = renderHistogram(histogram).split('\n');
    expect(lines[2]).toBe(`50ns  [2] ${'#'.repeat(40)}`);
  });
});
