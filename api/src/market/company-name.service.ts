import { Injectable, Logger } from '@nestjs/common';
import { errorMessage, isRecord } from '../common/errors';
import { PolygonClient } from './polygon.client';

/**
 * Best-effort display name for a ticker from the reference-data endpoint.
 * Resolves to the ticker itself on any failure; it never rejects.
 */
@Injectable()
export class CompanyNameService {
  private readonly logger = new Logger(CompanyNameService.name);

  constructor(private readonly polygon: PolygonClient) {}

  async resolveCompanyName(ticker: string): Promise<string> {
    try {
      const body = await this.polygon.get<unknown>(
        `/v3/reference/tickers/${encodeURIComponent(ticker)}`,
      );
      const name = extractCompanyName(body);
      if (name) return name;
      this.logger.warn(`No company name in reference data for ${ticker}`);
    } catch (error) {
      this.logger.warn(`Company name lookup failed for ${ticker}: ${errorMessage(error)}`);
    }
    return ticker;
  }
}

export function extractCompanyName(body: unknown): string | undefined {
  if (!isRecord(body) || !isRecord(body.results)) return undefined;
  const { name } = body.results;
  return typeof name === 'string' && name.trim() ? name.trim() : undefined;
}
