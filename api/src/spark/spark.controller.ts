import { Controller, Get, Query, Res, StreamableFile, UseGuards } from '@nestjs/common';
import type { Response } from 'express';
import { BasicAuthGuard } from '../auth/basic-auth.guard';
import { ProviderConfiguredGuard } from '../market/provider-configured.guard';
import { SparkQueryDto, toChartRequest } from './dto/spark-query.dto';
import { SparkService } from './spark.service';

export const CHART_CACHE_CONTROL = 'public, max-age=300';

/**
 * Spark Controller
 * GET /?ticker=AAPL&duration=day&size=480x480 (also served at /spark)
 * Returns the chart as image/png, cacheable for five minutes.
 */
@Controller()
@UseGuards(BasicAuthGuard, ProviderConfiguredGuard)
export class SparkController {
  constructor(private readonly spark: SparkService) {}

  @Get(['', 'spark'])
  async getChart(
    @Query() q: SparkQueryDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<StreamableFile> {
    const image = await this.spark.createChart(toChartRequest(q));

    // only a finished image is cacheable
    res.setHeader('Cache-Control', CHART_CACHE_CONTROL);
    return new StreamableFile(image.data, { type: image.contentType, length: image.data.length });
  }
}
