import { UpstreamDomainError } from '../common/errors';
import type { PriceBar } from '../market/market.models';
import {
  DOWN_COLOR,
  UP_COLOR,
  buildAnnotation,
  buildChartLayout,
  computeYBounds,
  estimateLabelWidth,
  formatPrice,
  formatTimeLabel,
  maxTimeLabels,
  selectTickIndices,
  selectTimeLabelFormat,
} from './chart-layout';

const NY = 'America/New_York';
const DAY_MS = 86_400_000;
// 2024-06-17 09:30 EDT
const OPEN_MS = Date.UTC(2024, 5, 17, 13, 30);

function bars(closes: number[], stepMs = 300_000): PriceBar[] {
  return closes.map((close, i) => ({ timestamp: OPEN_MS + i * stepMs, close }));
}

describe('computeYBounds', () => {
  it('pads a flat series by 1% of the price', () => {
    expect(computeYBounds([100, 100, 100])).toEqual({ min: 99, max: 101, padding: 1 });
  });

  it('pads by the larger of 5% of the range and 0.5% of the low', () => {
    expect(computeYBounds([100, 110])).toEqual({ min: 99.5, max: 110.5, padding: 0.5 });
    expect(computeYBounds([100, 200])).toEqual({ min: 95, max: 205, padding: 5 });
    expect(computeYBounds([1000, 1001])).toEqual({ min: 995, max: 1006, padding: 5 });
  });
});

describe('selectTickIndices', () => {
  it.each([
    [0, []],
    [1, [0]],
    [3, [0, 1, 2]],
    [6, [0, 1, 2, 3, 4, 5]],
    [10, [0, 1, 3, 5, 7, 9]],
    [100, [0, 19, 39, 59, 79, 99]],
  ])('n=%i -> %p', (n, expected) => {
    expect(selectTickIndices(n)).toEqual(expected);
  });
});

describe('maxTimeLabels', () => {
  it('estimates label width from its length', () => {
    expect(estimateLabelWidth('09:30', 10)).toBe(30);
  });

  it.each([
    [368, 42, 14, 6],
    [368, 92.4, 14, 3],
    [36, 24, 8, 1],
    [36, 52.8, 8, 0],
  ])('fits %i px of plot with %d px labels and %i px gaps -> %i', (width, label, gap, expected) => {
    expect(maxTimeLabels(width, label, gap)).toBe(expected);
  });

  it('never exceeds the tick count', () => {
    expect(maxTimeLabels(5000, 10, 2)).toBe(6);
  });
});

describe('time labels', () => {
  it.each([
    [0, 'time'],
    [DAY_MS - 1, 'time'],
    [DAY_MS, 'datetime'],
    [7 * DAY_MS - 1, 'datetime'],
    [7 * DAY_MS, 'date'],
    [30 * DAY_MS, 'date'],
  ])('span %i ms uses the %s format', (span, format) => {
    expect(selectTimeLabelFormat(span)).toBe(format);
  });

  it('renders US Eastern wall-clock time', () => {
    expect(formatTimeLabel(OPEN_MS, 'time', NY)).toBe('09:30');
    expect(formatTimeLabel(OPEN_MS, 'datetime', NY)).toBe('06/17 09:30');
    expect(formatTimeLabel(OPEN_MS, 'date', NY)).toBe('06/17');
  });

  it('follows daylight saving time', () => {
    expect(formatTimeLabel(Date.UTC(2024, 0, 5, 14, 30), 'datetime', NY)).toBe('01/05 09:30');
  });

  it('uses a 00-23 hour clock', () => {
    expect(formatTimeLabel(Date.UTC(2024, 5, 18, 4, 0), 'time', NY)).toBe('00:00');
    expect(formatTimeLabel(Date.UTC(2024, 5, 17, 20, 5), 'time', NY)).toBe('16:05');
  });
});

describe('annotation', () => {
  it('formats the latest close as currency', () => {
    expect(formatPrice(1234.5)).toBe('$1,234.50');
  });

  it('shows a signed gain in green', () => {
    expect(buildAnnotation(100, 110)).toEqual({ price: '$110.00', change: '+10.00 (+10.00%)', color: UP_COLOR });
  });

  it('shows a signed loss in red', () => {
    expect(buildAnnotation(100, 95.5)).toEqual({ price: '$95.50', change: '-4.50 (-4.50%)', color: DOWN_COLOR });
  });

  it('treats no change as non-negative', () => {
    expect(buildAnnotation(50, 50)).toEqual({ price: '$50.00', change: '+0.00 (+0.00%)', color: UP_COLOR });
  });

  it('reports 0% when the first close is zero', () => {
    expect(buildAnnotation(0, 5).change).toBe('+5.00 (+0.00%)');
  });
});

describe('buildChartLayout', () => {
  const input = { bars: bars([100, 105, 110]), ticker: 'AAPL', companyName: 'Apple Inc.', width: 480, height: 480 };

  it('fails without data', () => {
    const run = () => buildChartLayout({ ...input, bars: [] }, { style: 'detailed', timeZone: NY });
    expect(run).toThrow(UpstreamDomainError);
    expect(run).toThrow('No price data available');
  });

  it('maps the series into the plot area', () => {
    const layout = buildChartLayout(input, { style: 'detailed', timeZone: NY });

    expect(layout.plot).toEqual({ left: 84, top: 66, width: 368, height: 378 });
    expect(layout.yBounds).toEqual({ min: 99.5, max: 110.5, padding: 0.5 });
    expect(layout.points.map((p) => p.x)).toEqual([84, 268, 452]);
    expect(layout.points[0].y).toBeCloseTo(66 + (1 - 0.5 / 11) * 378, 6);
    expect(layout.baselineY).toBe(444);
  });

  it('labels the axes and the series', () => {
    const layout = buildChartLayout(input, { style: 'detailed', timeZone: NY });

    expect(layout.title).toBe('AAPL - Apple Inc.');
    expect(layout.xTicks).toEqual([
      { at: 84, label: '09:30' },
      { at: 268, label: '09:35' },
      { at: 452, label: '09:40' },
    ]);
    expect(layout.yTicks.map((t) => t.label)).toEqual(['99.50', '102.25', '105.00', '107.75', '110.50']);
    expect(layout.yTicks[0].at).toBe(444);
    expect(layout.yTicks[4].at).toBe(66);
    expect(layout.annotation).toEqual({ price: '$110.00', change: '+10.00 (+10.00%)', color: UP_COLOR });
  });

  it('switches to dated labels for multi-day spans', () => {
    const weekly = buildChartLayout(
      { ...input, bars: bars([10, 11, 12], 2 * DAY_MS) },
      { style: 'detailed', timeZone: NY },
    );
    expect(weekly.xTicks.map((t) => t.label)).toEqual(['06/17 09:30', '06/19 09:30', '06/21 09:30']);
  });

  it('uses almost the whole canvas in the minimal style', () => {
    const layout = buildChartLayout(input, { style: 'minimal', timeZone: NY });
    expect(layout.plot).toEqual({ left: 5, top: 5, width: 470, height: 470 });
  });

  it('places a single bar at the left edge', () => {
    const layout = buildChartLayout({ ...input, bars: bars([42]) }, { style: 'detailed', timeZone: NY });
    expect(layout.points).toHaveLength(1);
    expect(layout.points[0].x).toBe(84);
    expect(layout.xTicks).toEqual([{ at: 84, label: '09:30' }]);
    expect(layout.yBounds.padding).toBeCloseTo(0.42, 10);
  });

  it('keeps every tick mark but drops labels that would not fit', () => {
    const small = { ...input, width: 100, height: 100 };

    const intraday = buildChartLayout({ ...small, bars: bars(new Array<number>(10).fill(100)) }, { style: 'detailed', timeZone: NY });
    expect(intraday.plot).toEqual({ left: 48, top: 35, width: 36, height: 44 });
    expect(intraday.xTickMarks).toHaveLength(6);
    expect(intraday.xTickMarks[0]).toBe(48);
    expect(intraday.xTickMarks[5]).toBe(84);
    expect(intraday.xTicks).toEqual([{ at: 48, label: '09:30' }]);

    const multiDay = buildChartLayout(
      { ...small, bars: bars(new Array<number>(10).fill(100), 3 * 3_600_000) },
      { style: 'detailed', timeZone: NY },
    );
    expect(multiDay.xTickMarks).toHaveLength(6);
    expect(multiDay.xTicks).toEqual([]);
  });

  it('thins labels on a medium canvas', () => {
    const layout = buildChartLayout(
      { ...input, bars: bars(new Array<number>(10).fill(100)), width: 240, height: 240 },
      { style: 'detailed', timeZone: NY },
    );
    expect(layout.xTickMarks).toHaveLength(6);
    expect(layout.xTicks.map((t) => t.label)).toEqual(['09:30', '09:40', '09:50', '10:00', '10:15']);
  });
});
