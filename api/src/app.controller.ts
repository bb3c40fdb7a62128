import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from './config/configuration';

@Controller()
export class AppController {
  constructor(private readonly config: ConfigService<AppConfig, true>) {}

  // unauthenticated liveness probe
  @Get('health')
  health() {
    return {
      ok: true,
      env: this.config.get('nodeEnv', { infer: true }),
    };
  }
}
