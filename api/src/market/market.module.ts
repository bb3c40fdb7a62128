import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../config/configuration';
import { CompanyNameService } from './company-name.service';
import { MarketService } from './market.service';
import { PolygonClient } from './polygon.client';

@Module({
  imports: [
    HttpModule.registerAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService<AppConfig, true>) => ({
        timeout: config.get('polygon', { infer: true }).timeoutMs,
      }),
    }),
  ],
  providers: [PolygonClient, MarketService, CompanyNameService],
  exports: [MarketService, CompanyNameService],
})
export class MarketModule {}
