import { ValidationPipe } from '@nestjs/common';
import { NestExpressApplication } from '@nestjs/platform-express';
import cookieParser from 'cookie-parser';
import { AppConfigService } from './configs/app-config.service';
import { HttpExceptionFilter } from './filters/http-exception.filter';

/** URL prefix under which STATIC_DIR (card photos and logos) is served */
export const STATIC_PREFIX = '/static';

/**
 * Everything main.ts applies to the application besides Swagger and listen(),
 * shared with the HTTP tests.
 */
export function configureApp(app: NestExpressApplication): void {
  const configService = app.get(AppConfigService);

  app.use(cookieParser());
  app.useStaticAssets(configService.staticDir, {
    prefix: `${STATIC_PREFIX}/`,
    index: false,
  });
  app.useGlobalPipes(new ValidationPipe({ transform: true }));
  app.useGlobalFilters(new HttpExceptionFilter());
}
