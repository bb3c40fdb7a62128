/** Granularity of one aggregate bar, as the provider names it. */
export type Timespan = 'minute' | 'hour' | 'day';

/** One closing price; timestamps are UTC epoch milliseconds. */
export interface PriceBar {
  readonly timestamp: number;
  readonly close: number;
}

/** Concrete query window derived from a duration keyword. */
export interface ChartWindow {
  start: Date;
  end: Date;
  timespan: Timespan;
  multiplier: number;
}

/** Raw aggregates payload from /v2/aggs. Fields are optional: it is external input. */
export interface PolygonAggregatesResponse {
  status?: string;
  ticker?: string;
  resultsCount?: number;
  queryCount?: number;
  adjusted?: boolean;
  results?: PolygonAggregate[];
  error?: string;
  request_id?: string;
}

/** Single aggregate bar (o/h/l/v/vw/n are present upstream but unused here). */
export interface PolygonAggregate {
  t: number;
  c: number;
  o?: number;
  h?: number;
  l?: number;
  v?: number;
  vw?: number;
  n?: number;
}
