import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { ConfigService } from './config/config.service';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  const app = await NestFactory.create(AppModule);

  const configService = app.get(ConfigService);

  app.setGlobalPrefix(configService.apiPrefix);
  app.enableShutdownHooks();

  app.enableCors({
    origin: configService.corsOrigins,
  });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  // Swagger documentation (not in production)
  if (!configService.isProduction) {
    const config = new DocumentBuilder()
      .setTitle('Cloakscope API')
      .setDescription('SEO metadata extraction and cloaking detection')
      .setVersion('0.0.1')
      .addTag('Health', 'Health check endpoints')
      .addTag('Analyze', 'SEO analysis and cloaking detection')
      .addTag('Crawler View', 'Pages as crawlers and visitors see them')
      .build();

    const document = SwaggerModule.createDocument(app, config);
    SwaggerModule.setup(`${configService.apiPrefix}/docs`, app, document);

    logger.log(`Swagger docs available at http://localhost:${configService.port}/${configService.apiPrefix}/docs`);
  }

  const port = configService.port;
  await app.listen(port);

  logger.log(`Cloakscope API running on http://localhost:${port}/${configService.apiPrefix}`);
}

bootstrap().catch((error: unknown) => {
  logger.error('Failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
