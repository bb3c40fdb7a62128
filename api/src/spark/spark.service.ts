import { Injectable, Logger } from '@nestjs/common';
import { ChartRendererService, type ChartImage } from '../chart/chart-renderer.service';
import { CompanyNameService } from '../market/company-name.service';
import { MarketService } from '../market/market.service';
import type { ChartRequest } from './dto/spark-query.dto';
import { resolveWindow } from './window';

@Injectable()
export class SparkService {
  private readonly logger = new Logger(SparkService.name);

  constructor(
    private readonly market: MarketService,
    private readonly companyNames: CompanyNameService,
    private readonly renderer: ChartRendererService,
  ) {}

  /**
   * Resolve the window, fetch the name and the bars side by side, and paint.
   * The name lookup cannot fail the request; a bar failure propagates.
   */
  async createChart(request: ChartRequest, now: Date = new Date()): Promise<ChartImage> {
    const { ticker, width, height } = request;
    const window = resolveWindow(request.duration, now);

    const [companyName, bars] = await Promise.all([
      this.companyNames.resolveCompanyName(ticker),
      this.market.getPriceBars(ticker, window, now),
    ]);

    const image = await this.renderer.render({ bars, ticker, companyName, width, height });
    this.logger.log(`[chart] ${ticker} ${request.duration} ${width}x${height} -> ${image.data.length} bytes`);
    return image;
  }
}
