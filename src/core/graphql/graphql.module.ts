// src/core/graphql/graphql.module.ts

import { ApolloServerPluginLandingPageLocalDefault } from '@apollo/server/plugin/landingPage/default';
import { ApolloDriver, ApolloDriverConfig } from '@nestjs/apollo';
import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GraphQLModule } from '@nestjs/graphql';
import type { GraphQLSettings } from '../config/graphql.config';

/**
 * GraphQL 配置工厂函数
 * 关闭 introspection 时同时不挂载本地 landing page
 */
const createGraphQLConfig = (config: ConfigService): ApolloDriverConfig => {
  const settings = config.getOrThrow<GraphQLSettings>('graphql');

  return {
    autoSchemaFile: settings.schemaDestination,
    sortSchema: settings.sortSchema,
    introspection: settings.introspection,
    includeStacktraceInErrorResponses: settings.includeStacktrace,
    playground: false,
    plugins: settings.introspection ? [ApolloServerPluginLandingPageLocalDefault()] : [],
  };
};

/**
 * GraphQL 模块
 * code-first：schema 由 adapters/graphql 下的装饰器类生成
 */
@Module({
  imports: [
    GraphQLModule.forRootAsync<ApolloDriverConfig>({
      driver: ApolloDriver,
      inject: [ConfigService],
      useFactory: createGraphQLConfig,
    }),
  ],
  exports: [GraphQLModule],
})
export class AppGraphQLModule {}
