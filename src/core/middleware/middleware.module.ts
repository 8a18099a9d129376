// src/core/middleware/middleware.module.ts

import { MiddlewareConsumer, Module, NestModule, RequestMethod } from '@nestjs/common';
import { FormatResponseMiddleware } from './format-response.middleware';

/**
 * 应用级中间件
 * 响应信封只作用于 REST 路由；/graphql 的响应由 Apollo 自行输出
 */
@Module({
  providers: [FormatResponseMiddleware],
})
export class MiddlewareModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer
      .apply(FormatResponseMiddleware)
      .exclude({ path: 'graphql', method: RequestMethod.ALL })
      .forRoutes('*');
  }
}
