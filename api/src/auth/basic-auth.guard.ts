import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Request } from 'express';
import type { AppConfig } from '../config/configuration';
import { ConfigurationError, UnauthorizedError } from '../common/errors';
import { verifyBasicAuth } from './basic-auth';

/**
 * Basic Auth Guard
 * Compares the request's Basic credentials with the configured pair.
 * Runs before any query validation, so a bad header always yields 401.
 */
@Injectable()
export class BasicAuthGuard implements CanActivate {
  constructor(private readonly config: ConfigService<AppConfig, true>) {}

  canActivate(context: ExecutionContext): boolean {
    const credentials = this.config.get('auth', { infer: true });
    if (!credentials.password) {
      throw new ConfigurationError('BASIC_AUTH_PASSWORD');
    }

    const req = context.switchToHttp().getRequest<Request>();
    if (!verifyBasicAuth(req.headers.authorization, credentials)) {
      throw new UnauthorizedError();
    }
    return true;
  }
}
