import { CanActivate, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../config/configuration';
import { ConfigurationError } from '../common/errors';

/** Rejects with 500 before any upstream work when no API key is configured. */
@Injectable()
export class ProviderConfiguredGuard implements CanActivate {
  constructor(private readonly config: ConfigService<AppConfig, true>) {}

  canActivate(): boolean {
    if (!this.config.get('polygon', { infer: true }).apiKey) {
      throw new ConfigurationError('POLYGON_API_KEY');
    }
    return true;
  }
}
