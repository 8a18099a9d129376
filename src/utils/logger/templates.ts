// src/utils/logger/templates.ts
import { Request } from 'express';
import { PinoLogger } from 'nestjs-pino';

/**
 * 常见日志格式模板函数
 */
export const logTemplates = {
  /**
   * 精简请求信息
   */
  minimalRequest: (req: Request): { url: string; method: string } => ({
    url: req.originalUrl ?? req.url,
    method: req.method,
  }),
};

/**
 * 输出 error 日志，上下文沿用 logger 自身的 setContext
 */
export function errorLog(logger: PinoLogger, message: string, payload?: unknown): void {
  logger.error(payload ?? {}, message);
}

/**
 * 带错误堆栈的 error 日志
 */
export function errorLogWithStack(
  logger: PinoLogger,
  message: string,
  error: Error,
  payload?: Record<string, unknown>,
): void {
  logger.error(
    {
      ...payload,
      error: {
        message: error.message,
        stack: error.stack,
        name: error.name,
      },
    },
    message,
  );
}
