import 'reflect-metadata';

import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import type { ServerSettings } from './core/config/server.config';

/**
 * 应用程序启动函数
 * 使用 NestJS ConfigService 获取配置信息
 */
async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, { bufferLogs: true });

  // 使用 PinoLogger 作为 Nest 应用日志
  const logger = app.get(Logger);
  app.useLogger(logger);

  const configService = app.get<ConfigService>(ConfigService);
  const server = configService.getOrThrow<ServerSettings>('server');

  app.useBodyParser('json', { limit: server.bodyLimit });

  if (server.cors.enabled) {
    app.enableCors({
      origin: server.cors.origins.length > 0 ? server.cors.origins : true,
      credentials: server.cors.credentials,
    });
  }

  const { host, port } = server;
  const nodeEnv = configService.get<string>('NODE_ENV', 'development');

  await app.listen(port, host);

  logger.log(`🚀 NestJS 服务在 http://${host}:${port} 上以 ${nodeEnv} 模式启动成功`);
}

void bootstrap();
