import './lib/tracing/tracing';
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { ValidationPipe } from '@nestjs/common';
import helmet from 'helmet';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { ConfigService } from '@nestjs/config';
import { NestExpressApplication } from '@nestjs/platform-express';
import { GradewiseLogger } from './lib/logger';

function parseOrigins(raw: string | undefined): string[] {
  if (!raw) return ['http://localhost:5173'];
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed) || !parsed.every((o) => typeof o === 'string')) {
    throw new Error('ALLOWED_ORIGINS must be a JSON array of strings');
  }
  return parsed;
}

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bufferLogs: true,
  });
  app.useLogger(await app.resolve(GradewiseLogger));
  app.set('trust proxy', 'loopback');
  const config = app.get(ConfigService);

  app.use(helmet());

  app.enableCors({
    origin: parseOrigins(config.get<string>('ALLOWED_ORIGINS')),
    credentials: true,
  });

  app.setGlobalPrefix('api');
  app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true }));
  const SwaggerCfg = new DocumentBuilder()
    .setTitle('Gradewise API')
    .setDescription(
      'Submission grading pipeline: extraction, AI evaluation, grading and LMS sync',
    )
    .setVersion('1.0')
    .build();

  const document = SwaggerModule.createDocument(app, SwaggerCfg);
  SwaggerModule.setup('docs', app, document, {
    swaggerOptions: {
      operationsSorter: 'alpha',
      tagsSorter: 'alpha',
    },
  });

  await app.listen(config.get<string>('PORT') ?? 8080);
}
void bootstrap();
