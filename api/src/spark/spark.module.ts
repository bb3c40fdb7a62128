import { Module } from '@nestjs/common';
import { ChartModule } from '../chart/chart.module';
import { MarketModule } from '../market/market.module';
import { SparkController } from './spark.controller';
import { SparkService } from './spark.service';

@Module({
  imports: [MarketModule, ChartModule],
  controllers: [SparkController],
  providers: [SparkService],
})
export class SparkModule {}
