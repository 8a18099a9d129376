// src/app.module.ts

import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { GraphQLAdapterModule } from './adapters/graphql/graphql-adapter.module';
import { HttpAdapterModule } from './adapters/http/http-adapter.module';
import { AppController } from './app.controller';
import { AllExceptionsFilter } from './core/common/filters/all-exceptions.filter';
import { AppConfigModule } from './core/config/config.module';
import { AppGraphQLModule } from './core/graphql/graphql.module';
import { LoggerModule } from './core/logger/logger.module';
import { MiddlewareModule } from './core/middleware/middleware.module';

@Module({
  imports: [
    AppConfigModule,
    LoggerModule,
    MiddlewareModule,
    AppGraphQLModule,
    // REST 适配器：/api/activities
    HttpAdapterModule,
    // GraphQL 适配器：/graphql
    GraphQLAdapterModule,
  ],
  controllers: [AppController],
  providers: [
    {
      provide: APP_FILTER,
      useClass: AllExceptionsFilter,
    },
  ],
})
export class AppModule {}
