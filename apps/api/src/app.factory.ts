import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, type NestFastifyApplication } from '@nestjs/platform-fastify';
import type { LogLevel } from '@nestjs/common';
import cors from '@fastify/cors';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module.js';

export const GLOBAL_PREFIX = 'api';

export const createApp = async (logger: LogLevel[] | false = ['error', 'warn']): Promise<NestFastifyApplication> => {
  const app = await NestFactory.create<NestFastifyApplication>(AppModule, new FastifyAdapter(), { logger });
  await app.register(cors, { origin: true });

  app.setGlobalPrefix(GLOBAL_PREFIX);
  return app;
};

export const setupDocs = (app: NestFastifyApplication): void => {
  const config = new DocumentBuilder()
    .setTitle('Seva Recommender API')
    .setDescription('District, demographic and content-similarity service recommendations')
    .setVersion('0.1.0')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('docs', app, document);
};
