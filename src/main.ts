import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app/app.module';
import { configureApp } from './app/app.setup';
import { AppConfigService } from './app/configs/app-config.service';
import { CustomLogger } from './app/logger/custom.logger';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: new CustomLogger(),
  });

  configureApp(app);
  app.enableShutdownHooks();

  const config = new DocumentBuilder()
    .setTitle('Digital Card API')
    .setDescription('Card pages, contact downloads, click tracking and admin')
    .setVersion('1.0')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  const configService = app.get(AppConfigService);
  await app.listen(configService.port);
}
bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Failed to start',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
