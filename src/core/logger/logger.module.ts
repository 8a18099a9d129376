// src/core/logger/logger.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { LoggerModule as PinoLoggerModule } from 'nestjs-pino';
import type { LoggerSettings } from '../config/logger.config';

/**
 * 日志模块
 * pino-http 负责请求日志；业务代码注入 PinoLogger 并设置上下文
 */
@Module({
  imports: [
    ConfigModule,
    PinoLoggerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const settings = configService.getOrThrow<LoggerSettings>('logger');
        return {
          pinoHttp: {
            level: settings.level,
            transport: settings.transport,
            redact: settings.redactFields,
            customProps: settings.customProps,
            customLogLevel: settings.customLogLevel,
            genReqId: settings.genReqId,
          },
        };
      },
    }),
  ],
})
export class LoggerModule {}
