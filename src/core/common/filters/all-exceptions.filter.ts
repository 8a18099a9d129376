// src/core/common/filters/all-exceptions.filter.ts
import type { ExceptionPayload, HttpErrorBody } from '@app-types/errors/exception-payload';
import {
  COMMON_ERROR,
  DomainError,
  fallbackErrorCodeForStatus,
  isDomainError,
  mapDomainErrorToHttpStatus,
  mapHttpToGqlCode,
} from '@core/common/errors';
import { ArgumentsHost, Catch, ExceptionFilter, HttpException } from '@nestjs/common';
import { GqlArgumentsHost, GqlContextType } from '@nestjs/graphql';
import { errorLogWithStack, logTemplates } from '@src/utils/logger/templates';
import { Request, Response } from 'express';
import { GraphQLError, GraphQLResolveInfo } from 'graphql';
import { PinoLogger } from 'nestjs-pino';

/** 协议无关的错误描述，由下方两个分支各自渲染 */
interface NormalizedError {
  status: number;
  errorCode: string;
  message: string;
  /** 仅在 HttpException 响应体显式给出时才有值 */
  gqlCode?: string;
  details?: unknown;
}

/** 从异常响应中提取错误信息 */
function extractPayload(resp: string | ExceptionPayload): {
  code?: string;
  errorCode?: string;
  message?: string;
  details?: unknown;
} {
  if (typeof resp === 'string') {
    return { message: resp };
  }
  const code = typeof resp.code === 'string' ? resp.code : undefined;
  const errorCode = typeof resp.errorCode === 'string' ? resp.errorCode : undefined;
  const details = resp.details;
  if (typeof resp.errorMessage === 'string') {
    return { code, errorCode, details, message: resp.errorMessage };
  }

  const msg = resp.message;
  if (Array.isArray(msg)) return { code, errorCode, details, message: msg.join(', ') };
  if (typeof msg === 'string') return { code, errorCode, details, message: msg };
  return { code, errorCode, details };
}

function normalizeDomainError(exception: DomainError): NormalizedError {
  return {
    status: mapDomainErrorToHttpStatus(exception.code),
    errorCode: exception.code,
    message: exception.message,
    details: exception.details,
  };
}

function normalizeHttpException(exception: HttpException): NormalizedError {
  const status = exception.getStatus();
  const resp = exception.getResponse();
  const payload: string | ExceptionPayload =
    typeof resp === 'string' ? resp : Object.fromEntries(Object.entries(resp));
  const { code, errorCode, message, details } = extractPayload(payload);
  return {
    status,
    errorCode: errorCode ?? fallbackErrorCodeForStatus(status),
    message: message ?? exception.message,
    gqlCode: code,
    details,
  };
}

function normalizeUnknown(): NormalizedError {
  return {
    status: 500,
    errorCode: COMMON_ERROR.INTERNAL_ERROR,
    message: 'Internal server error',
  };
}

/** 获取 GraphQL 字段路径 */
function getGqlPath(host: ArgumentsHost): string[] | undefined {
  const gqlHost = GqlArgumentsHost.create(host);
  const info = gqlHost.getInfo<GraphQLResolveInfo | undefined>();
  const field = info?.fieldName;
  return field ? [field] : undefined;
}

/**
 * 全局异常过滤器
 * - HTTP：按错误码映射状态码，输出统一 JSON 错误体
 * - GraphQL：构建 GraphQLError，extensions.code 为大类，extensions.errorCode 为业务码
 * 未知异常一律按 500 处理，并记录堆栈
 */
@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  constructor(private readonly logger: PinoLogger) {
    this.logger.setContext(AllExceptionsFilter.name);
  }

  catch(exception: unknown, host: ArgumentsHost): GraphQLError | void {
    const normalized = this.normalize(exception);

    if (host.getType<GqlContextType>() === 'graphql') {
      if (normalized.status >= 500) {
        this.logUnexpected(exception, { transport: 'graphql', path: getGqlPath(host) });
      }
      return new GraphQLError(normalized.message, {
        path: getGqlPath(host),
        extensions: {
          code: normalized.gqlCode ?? mapHttpToGqlCode(normalized.status),
          httpStatus: normalized.status,
          errorCode: normalized.errorCode,
          errorMessage: normalized.message,
          ...(normalized.details ? { details: normalized.details } : {}),
        },
      });
    }

    const ctx = host.switchToHttp();
    const req = ctx.getRequest<Request>();
    const res = ctx.getResponse<Response>();

    if (normalized.status >= 500) {
      this.logUnexpected(exception, { transport: 'http', ...logTemplates.minimalRequest(req) });
    }

    const body: HttpErrorBody = {
      statusCode: normalized.status,
      errorCode: normalized.errorCode,
      message: normalized.message,
      path: req.originalUrl ?? req.url,
      timestamp: new Date().toISOString(),
      ...(normalized.details ? { details: normalized.details } : {}),
    };
    res.status(normalized.status).json(body);
  }

  private normalize(exception: unknown): NormalizedError {
    if (isDomainError(exception)) return normalizeDomainError(exception);
    if (exception instanceof HttpException) return normalizeHttpException(exception);
    return normalizeUnknown();
  }

  private logUnexpected(exception: unknown, payload: Record<string, unknown>): void {
    const error = exception instanceof Error ? exception : new Error(String(exception));
    errorLogWithStack(this.logger, '请求处理过程中发生未预期的错误', error, payload);
  }
}
