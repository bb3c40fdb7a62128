import type { INestApplication } from '@nestjs/common';
import helmet from 'helmet';
import compression from 'compression';
import { ApiExceptionFilter } from './common/api-exception.filter';
import { createValidationPipe } from './common/validation';

/** Middleware, pipes and filters shared by the server and the e2e tests. */
export function configureApp(app: INestApplication): INestApplication {
  // Security + performance; charts are embedded cross-origin as <img> sources
  app.use(helmet({ crossOriginResourcePolicy: { policy: 'cross-origin' } }));
  app.use(compression());

  app.useGlobalPipes(createValidationPipe());
  app.useGlobalFilters(new ApiExceptionFilter());
  return app;
}
