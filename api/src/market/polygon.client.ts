import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { isAxiosError } from 'axios';
import { firstValueFrom } from 'rxjs';
import * as qs from 'querystring';
import type { AppConfig } from '../config/configuration';
import { UpstreamTransferError, errorMessage } from '../common/errors';

export type QueryParams = Record<string, string | number | boolean>;

/**
 * Thin GET wrapper around the Polygon REST API.
 * Appends the API key, makes exactly one attempt, and turns any transport
 * failure or non-2xx status into an {@link UpstreamTransferError}.
 */
@Injectable()
export class PolygonClient {
  private readonly logger = new Logger(PolygonClient.name);
  private readonly polygonKey: string;
  private readonly polygonBase: string;

  constructor(
    private readonly http: HttpService,
    config: ConfigService<AppConfig, true>,
  ) {
    const polygon = config.get('polygon', { infer: true });
    this.polygonKey = polygon.apiKey;
    this.polygonBase = polygon.baseUrl.replace(/\/+$/, '');
  }

  async get<T>(path: string, query: QueryParams = {}): Promise<T> {
    const url = `${this.polygonBase}${path}?` + qs.stringify({ ...query, apiKey: this.polygonKey });
    // never log the key
    const logUrl = `${this.polygonBase}${path}?` + qs.stringify(query);
    this.logger.debug(`GET ${logUrl}`);

    try {
      const res = await firstValueFrom(this.http.get<T>(url));
      return res.data;
    } catch (e: unknown) {
      const status = isAxiosError(e) ? e.response?.status : undefined;
      this.logger.warn(`[HTTP GET failed] ${logUrl} status=${status ?? 'none'}: ${errorMessage(e)}`);
      throw new UpstreamTransferError(
        status ? `Polygon request failed with status ${status}` : 'Polygon request failed',
        status,
      );
    }
  }
}
