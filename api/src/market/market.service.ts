import { Injectable, Logger } from '@nestjs/common';
import { UpstreamDomainError, isRecord } from '../common/errors';
import { PolygonClient } from './polygon.client';
import type { ChartWindow, PolygonAggregatesResponse, PriceBar } from './market.models';

/** Free-tier accounts can only look this far back. */
export const FREE_TIER_LOOKBACK_DAYS = 730;
/** Large enough to cover every supported window in one page. */
export const AGGREGATES_LIMIT = 50_000;

const DAY_MS = 86_400_000;
const RESPONSE_SNIPPET_LENGTH = 200;

@Injectable()
export class MarketService {
  private readonly logger = new Logger(MarketService.name);

  constructor(private readonly polygon: PolygonClient) {}

  /* ----------------------------- Public API ----------------------------- */

  /**
   * Closing prices for `ticker` across `window`, oldest first.
   * One upstream call; nothing is retried or cached.
   */
  async getPriceBars(ticker: string, window: ChartWindow, now = new Date()): Promise<PriceBar[]> {
    const start = clampToLookback(window.start, now);
    const fromISO = toISODate(start);
    const toISO = toISODate(window.end);

    const agg = await this.polygon.get<PolygonAggregatesResponse>(
      `/v2/aggs/ticker/${encodeURIComponent(ticker)}/range/${window.multiplier}/${window.timespan}/${fromISO}/${toISO}`,
      { adjusted: 'true', sort: 'asc', limit: AGGREGATES_LIMIT },
    );

    const bars = toPriceBars(ticker, agg, fromISO, toISO);
    this.logger.log(
      `[bars] ${ticker} ${window.multiplier}/${window.timespan} ${fromISO}..${toISO} -> ${bars.length} points`,
    );
    return bars;
  }
}

/* ------------------------------- Helpers ------------------------------ */

export function clampToLookback(start: Date, now: Date): Date {
  const earliest = new Date(now.getTime() - FREE_TIER_LOOKBACK_DAYS * DAY_MS);
  return start < earliest ? earliest : start;
}

/** UTC calendar date, YYYY-MM-DD. */
export function toISODate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

/**
 * Classify an aggregates payload. Throws {@link UpstreamDomainError} when the
 * provider reports an error or has nothing to chart.
 */
export function toPriceBars(
  ticker: string,
  payload: PolygonAggregatesResponse | undefined,
  fromISO: string,
  toISO: string,
): PriceBar[] {
  const agg: PolygonAggregatesResponse = isRecord(payload) ? payload : {};
  const results = Array.isArray(agg.results) ? agg.results : undefined;

  if (agg.status === 'ERROR') {
    const detail = typeof agg.error === 'string' && agg.error ? agg.error : 'Unknown error';
    throw new UpstreamDomainError(`Polygon API error: ${detail}`);
  }

  const count = typeof agg.resultsCount === 'number' ? agg.resultsCount : results?.length ?? 0;
  if (agg.status === 'OK' && count === 0) {
    throw new UpstreamDomainError(
      `No data available for ${ticker}. The market might be closed or this ticker has no recent trading activity.`,
    );
  }

  if (!results || results.length === 0) {
    const snippet = (JSON.stringify(payload) ?? '').slice(0, RESPONSE_SNIPPET_LENGTH);
    throw new UpstreamDomainError(
      `No data available for ${ticker} from ${fromISO} to ${toISO}. Response: ${snippet}`,
    );
  }

  const bars = results.map((r: unknown, i): PriceBar => {
    if (!isRecord(r) || !isFiniteNumber(r.t) || !isFiniteNumber(r.c)) {
      throw new UpstreamDomainError(`Malformed aggregate at index ${i}`);
    }
    return { timestamp: r.t, close: r.c };
  });

  // Requested with sort=asc; re-sort so the renderer can rely on it.
  return bars.sort((a, b) => a.timestamp - b.timestamp);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}
