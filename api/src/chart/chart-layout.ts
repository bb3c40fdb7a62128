import { UpstreamDomainError } from '../common/errors';
import type { ChartStyle } from '../config/configuration';
import type { PriceBar } from '../market/market.models';

export const MAX_X_TICKS = 6;
export const Y_TICK_COUNT = 5;
export const UP_COLOR = '#16a34a';
export const DOWN_COLOR = '#dc2626';

const DAY_MS = 86_400_000;
const WEEK_MS = 7 * DAY_MS;

export interface YBounds {
  min: number;
  max: number;
  padding: number;
}

export interface PlotArea {
  left: number;
  top: number;
  width: number;
  height: number;
}

export interface Point {
  x: number;
  y: number;
}

export interface AxisTick {
  /** Pixel position along the axis (x for time ticks, y for price ticks). */
  at: number;
  label: string;
}

export interface PriceAnnotation {
  price: string;
  change: string;
  color: string;
}

export interface Typography {
  titleSize: number;
  labelSize: number;
}

export interface ChartInput {
  bars: readonly PriceBar[];
  ticker: string;
  companyName: string;
  width: number;
  height: number;
}

export interface LayoutOptions {
  style: ChartStyle;
  timeZone: string;
}

export interface ChartLayout {
  width: number;
  height: number;
  style: ChartStyle;
  plot: PlotArea;
  yBounds: YBounds;
  points: Point[];
  /** Bottom edge of the area fill: the y of `yBounds.min`, never of zero. */
  baselineY: number;
  /** Time tick marks along the x axis. */
  xTickMarks: number[];
  /** Labelled time ticks; fewer than the marks when the plot is narrow. */
  xTicks: AxisTick[];
  yTicks: AxisTick[];
  title: string;
  annotation: PriceAnnotation;
  typography: Typography;
}

/* ------------------------------ Scales ------------------------------ */

/**
 * Price range plus padding. A flat series still gets a visible band
 * (1% of the price); otherwise pad by 5% of the range, at least 0.5% of the low.
 */
export function computeYBounds(closes: readonly number[]): YBounds {
  const min = Math.min(...closes);
  const max = Math.max(...closes);
  const range = max - min;
  const padding = range > 0 ? Math.max(0.05 * range, 0.005 * min) : 0.01 * min;
  return { min: min - padding, max: max + padding, padding };
}

/** Up to `maxTicks` evenly spaced bar indices; first and last always included. */
export function selectTickIndices(n: number, maxTicks = MAX_X_TICKS): number[] {
  if (n <= 0) return [];
  const count = Math.min(maxTicks, n);
  if (count === 1) return [0];
  const idxs = Array.from({ length: count }, (_, i) => Math.floor((i * (n - 1)) / (count - 1)));
  return [...new Set(idxs)];
}

export function xFromIndex(i: number, n: number, plot: PlotArea): number {
  if (n <= 1) return plot.left;
  return plot.left + (i / (n - 1)) * plot.width;
}

export function yFromPrice(p: number, bounds: YBounds, plot: PlotArea): number {
  const span = bounds.max - bounds.min;
  if (span <= 0) return plot.top + plot.height / 2;
  const ratio = (p - bounds.min) / span;
  return plot.top + (1 - ratio) * plot.height;
}

/* ------------------------------ Labels ------------------------------ */

export type TimeLabelFormat = 'time' | 'datetime' | 'date';

export function selectTimeLabelFormat(spanMs: number): TimeLabelFormat {
  if (spanMs < DAY_MS) return 'time';
  if (spanMs < WEEK_MS) return 'datetime';
  return 'date';
}

type ZonedParts = Record<'month' | 'day' | 'hour' | 'minute', string>;

const formatters = new Map<string, Intl.DateTimeFormat>();

function zonedParts(timestamp: number, timeZone: string): ZonedParts {
  let fmt = formatters.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat('en-US', {
      timeZone,
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      hourCycle: 'h23',
    });
    formatters.set(timeZone, fmt);
  }

  const out: ZonedParts = { month: '', day: '', hour: '', minute: '' };
  for (const part of fmt.formatToParts(timestamp)) {
    if (part.type === 'month' || part.type === 'day' || part.type === 'hour' || part.type === 'minute') {
      out[part.type] = part.value;
    }
  }
  return out;
}

/** Timestamps are UTC epoch ms; labels are wall-clock time in `timeZone`. */
export function formatTimeLabel(timestamp: number, format: TimeLabelFormat, timeZone: string): string {
  const p = zonedParts(timestamp, timeZone);
  const time = `${p.hour}:${p.minute}`;
  const date = `${p.month}/${p.day}`;
  switch (format) {
    case 'time':
      return time;
    case 'datetime':
      return `${date} ${time}`;
    case 'date':
      return date;
  }
}

// sans-serif digits run about 0.6em wide
const LABEL_CHAR_EM = 0.6;

export function estimateLabelWidth(label: string, fontSize: number): number {
  return label.length * fontSize * LABEL_CHAR_EM;
}

/** Labels that fit side by side across `plotWidth`, one `gap` apart; may be 0. */
export function maxTimeLabels(plotWidth: number, labelWidth: number, gap: number): number {
  return Math.min(MAX_X_TICKS, Math.floor(plotWidth / (labelWidth + gap)));
}

const usd = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function formatPrice(price: number): string {
  return usd.format(price);
}

export function buildAnnotation(first: number, latest: number): PriceAnnotation {
  const change = latest - first;
  const changePercent = first !== 0 ? (change / first) * 100 : 0;
  const sign = change >= 0 ? '+' : '-';
  return {
    price: formatPrice(latest),
    change: `${sign}${Math.abs(change).toFixed(2)} (${sign}${Math.abs(changePercent).toFixed(2)}%)`,
    color: change >= 0 ? UP_COLOR : DOWN_COLOR,
  };
}

/* ------------------------------ Layout ------------------------------ */

const clamp = (n: number, lo: number, hi: number) => Math.min(hi, Math.max(lo, n));

export function computeTypography(width: number, height: number): Typography {
  const base = Math.min(width, height);
  return {
    titleSize: clamp(Math.round(base / 24), 10, 20),
    labelSize: clamp(Math.round(base / 32), 8, 14),
  };
}

export function computePlotArea(width: number, height: number, style: ChartStyle, type: Typography): PlotArea {
  if (style === 'minimal') {
    const mx = Math.round(width * 0.01);
    const my = Math.round(height * 0.01);
    return { left: mx, top: my, width: width - 2 * mx, height: height - 2 * my };
  }

  // title line + annotation line above, price labels left, time labels below
  const left = type.labelSize * 6;
  const right = type.labelSize * 2;
  const top = Math.round(type.titleSize * 1.6 + type.labelSize * 2.4);
  const bottom = Math.round(type.labelSize * 2.6);
  return {
    left,
    top,
    width: Math.max(1, width - left - right),
    height: Math.max(1, height - top - bottom),
  };
}

/**
 * Map a price series onto chart geometry. Bars must be ascending by
 * timestamp: the first and last bars define the change and the label span.
 */
export function buildChartLayout(input: ChartInput, options: LayoutOptions): ChartLayout {
  const { bars, width, height } = input;
  if (bars.length === 0) {
    throw new UpstreamDomainError('No price data available');
  }

  const typography = computeTypography(width, height);
  const plot = computePlotArea(width, height, options.style, typography);
  const closes = bars.map((b) => b.close);
  const yBounds = computeYBounds(closes);
  const n = bars.length;

  const points = closes.map((c, i) => ({ x: xFromIndex(i, n, plot), y: yFromPrice(c, yBounds, plot) }));

  const first = bars[0];
  const last = bars[n - 1];
  const labelFormat = selectTimeLabelFormat(last.timestamp - first.timestamp);
  const xTickMarks = selectTickIndices(n).map((i) => xFromIndex(i, n, plot));

  const labelAt = (i: number) => formatTimeLabel(bars[i].timestamp, labelFormat, options.timeZone);
  const labelWidth = estimateLabelWidth(labelAt(0), typography.labelSize);
  const labelCount = maxTimeLabels(plot.width, labelWidth, typography.labelSize);
  const xTicks = selectTickIndices(n, labelCount).map((i) => ({
    at: xFromIndex(i, n, plot),
    label: labelAt(i),
  }));

  const yTicks: AxisTick[] = [];
  for (let i = 0; i < Y_TICK_COUNT; i++) {
    const val = yBounds.min + (i / (Y_TICK_COUNT - 1)) * (yBounds.max - yBounds.min);
    yTicks.push({ at: yFromPrice(val, yBounds, plot), label: val.toFixed(2) });
  }

  return {
    width,
    height,
    style: options.style,
    plot,
    yBounds,
    points,
    baselineY: yFromPrice(yBounds.min, yBounds, plot),
    xTickMarks,
    xTicks,
    yTicks,
    title: `${input.ticker} - ${input.companyName}`,
    annotation: buildAnnotation(first.close, last.close),
    typography,
  };
}
