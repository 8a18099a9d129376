// src/core/middleware/format-response.middleware.ts

import {
  ApiResponse,
  RESPONSE_FORMAT_ENVELOPE,
  RESPONSE_FORMAT_HEADER,
  ShowType,
} from '@app-types/response.types';
import { COMMON_ERROR } from '@core/common/errors';
import { Injectable, NestMiddleware } from '@nestjs/common';
import { NextFunction, Request, Response } from 'express';
import { PinoLogger } from 'nestjs-pino';

type ErrorFields = { errorCode: string; errorMessage: string };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * HTTP 响应格式化中间件
 * 仅当请求头 x-response-format: envelope 时，将 JSON 响应包装为 Ant Design Pro 约定格式
 * 拦截 res.json 方法，只对经由 res.json 输出的 REST 响应生效（GraphQL 由 Apollo 直接写出）
 */
@Injectable()
export class FormatResponseMiddleware implements NestMiddleware {
  constructor(private readonly logger: PinoLogger) {
    this.logger.setContext(FormatResponseMiddleware.name);
  }

  use(req: Request, res: Response, next: NextFunction): void {
    if (req.headers[RESPONSE_FORMAT_HEADER] !== RESPONSE_FORMAT_ENVELOPE) {
      next();
      return;
    }

    const originalJson = res.json.bind(res);
    res.json = (body: unknown): Response => {
      try {
        return originalJson(this.formatToAntdProResponse(req, res, body));
      } catch (error) {
        this.logger.error(
          {
            error: error instanceof Error ? error.message : String(error),
            path: req.url,
            method: req.method,
          },
          '响应格式化过程中发生错误',
        );
        return originalJson(body);
      }
    };

    next();
  }

  /**
   * 格式化响应为 Ant Design Pro 格式
   */
  private formatToAntdProResponse(req: Request, res: Response, body: unknown): ApiResponse {
    const traceId = this.generateTraceId();
    const host = req.headers.host || 'unknown';

    // REST 错误（由全局异常过滤器输出）
    if (res.statusCode >= 400) {
      return this.wrapError(this.extractHttpError(body, res.statusCode), traceId, host);
    }

    return {
      success: true,
      data: body,
      traceId,
      host,
    };
  }

  /**
   * 从 REST 错误响应体中提取错误码与错误信息
   */
  private extractHttpError(body: unknown, statusCode: number): ErrorFields {
    const fallbackCode = statusCode >= 500 ? COMMON_ERROR.INTERNAL_ERROR : COMMON_ERROR.BAD_REQUEST;
    if (!isRecord(body)) {
      return { errorCode: fallbackCode, errorMessage: String(body) };
    }
    return {
      errorCode: typeof body.errorCode === 'string' ? body.errorCode : fallbackCode,
      errorMessage: typeof body.message === 'string' ? body.message : 'Request failed',
    };
  }

  /**
   * 按照 ApiResponse<T> 和 ShowType 生成 error envelope
   */
  private wrapError(error: ErrorFields, traceId: string, host: string): ApiResponse {
    return {
      success: false,
      data: null,
      errorCode: error.errorCode,
      errorMessage: error.errorMessage,
      showType: ShowType.ERROR_MESSAGE,
      traceId,
      host,
    };
  }

  /**
   * 生成追踪 ID
   */
  private generateTraceId(): string {
    return `${Date.now()}-${Math.random().toString(36).substring(2, 11)}`;
  }
}
