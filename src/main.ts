import 'reflect-metadata';

import { ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import helmet from 'helmet';
import { WINSTON_MODULE_NEST_PROVIDER } from 'nest-winston';
import { AppModule } from './app.module';
import { AllExceptionsFilter } from './common/filters';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(WINSTON_MODULE_NEST_PROVIDER));

  // Security: Apply Helmet for HTTP security headers
  app.use(helmet());

  // Stops the rate updater and closes Redis on SIGTERM/SIGINT
  app.enableShutdownHooks();

  // Global prefix; /metrics stays at the root for scrapers
  app.setGlobalPrefix('api/v1', { exclude: ['metrics'] });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidNonWhitelisted: true,
    }),
  );

  app.useGlobalFilters(new AllExceptionsFilter());

  const config = new DocumentBuilder()
    .setTitle(process.env.APP_NAME || 'FX Rate Engine')
    .setDescription('Exchange rate caching and currency conversion')
    .setVersion('1.0')
    .addTag('Currency', 'Rates and conversions')
    .addTag('Health', 'Liveness and readiness probes')
    .build();

  if (process.env.NODE_ENV !== 'production' || process.env.ENABLE_SWAGGER === 'true') {
    const document = SwaggerModule.createDocument(app, config);
    SwaggerModule.setup('api/docs', app, document);
  }

  const port = process.env.PORT || 3000;
  await app.listen(port);
}
void bootstrap();
