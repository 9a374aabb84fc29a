import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  const configService = app.get(ConfigService);
  const logger = new Logger('Bootstrap');

  // Enable validation
  app.useGlobalPipes(new ValidationPipe({ whitelist: true }));

  // Swagger setup
  if (configService.get<string>('ENABLE_SWAGGER', 'true') !== 'false') {
    const config = new DocumentBuilder()
      .setTitle('Keyword Index API')
      .setDescription('Build keyword indices over a text corpus and run two-keyword searches')
      .setVersion('0.1')
      .build();
    const document = SwaggerModule.createDocument(app, config);
    SwaggerModule.setup(configService.get<string>('DOCS_PATH', 'api'), app, document);
  }

  // Get port from environment or use default
  const port = Number(configService.get<string>('PORT', '3000'));
  const host = configService.get<string>('HOST', '0.0.0.0');

  await app.listen(port, host);
  logger.log(`Application is running on: ${await app.getUrl()}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(`Failed to start: ${String(error)}`);
  process.exit(1);
});
