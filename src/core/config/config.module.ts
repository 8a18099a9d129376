// src/core/config/config.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import activitiesConfig from './activities.config';
import { validateEnvironment } from './env.validation';
import graphqlConfig from './graphql.config';
import loggerConfig from './logger.config';
import serverConfig from './server.config';

/**
 * 全局配置模块
 * 先读取 env/.env.<NODE_ENV>，缺失的变量再由 env/.env.development 补齐
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: [`env/.env.${process.env.NODE_ENV || 'development'}`, 'env/.env.development'],
      validate: validateEnvironment,
      load: [serverConfig, loggerConfig, graphqlConfig, activitiesConfig],
    }),
  ],
})
export class AppConfigModule {}
