import { RequestValidationError } from '../common/errors';
import type { ChartWindow, Timespan } from '../market/market.models';

export const DURATION_KEYWORDS = ['hour', 'day', 'week', 'month'] as const;
export type DurationKeyword = (typeof DURATION_KEYWORDS)[number];

export interface DurationSpec {
  keyword: DurationKeyword;
  spanMs: number;
  timespan: Timespan;
  multiplier: number;
}

const HOUR_MS = 3_600_000;
const DAY_MS = 24 * HOUR_MS;

/** Fixed lookup: how far back each keyword reaches and at what bar size. */
export const DURATION_SPECS: Readonly<Record<DurationKeyword, DurationSpec>> = Object.freeze({
  hour: { keyword: 'hour', spanMs: HOUR_MS, timespan: 'minute', multiplier: 1 },
  day: { keyword: 'day', spanMs: DAY_MS, timespan: 'minute', multiplier: 5 },
  week: { keyword: 'week', spanMs: 7 * DAY_MS, timespan: 'hour', multiplier: 1 },
  month: { keyword: 'month', spanMs: 30 * DAY_MS, timespan: 'day', multiplier: 1 },
});

export function isDurationKeyword(value: string): value is DurationKeyword {
  return (DURATION_KEYWORDS as readonly string[]).includes(value);
}

/** `[now - span, now]` at the keyword's bar granularity. */
export function resolveWindow(duration: string, now: Date = new Date()): ChartWindow {
  if (!isDurationKeyword(duration)) {
    throw new RequestValidationError(`Invalid duration: ${duration}`);
  }
  const spec = DURATION_SPECS[duration];
  return {
    start: new Date(now.getTime() - spec.spanMs),
    end: new Date(now.getTime()),
    timespan: spec.timespan,
    multiplier: spec.multiplier,
  };
}
