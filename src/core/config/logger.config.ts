// src/core/config/logger.config.ts
import { ConfigFactory } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { IncomingMessage, ServerResponse } from 'http';
import type { Options } from 'pino-http';

export const REQUEST_ID_HEADER = 'x-request-id';

export interface LoggerSettings {
  level: string;
  redactFields: string[];
  customProps: Options['customProps'];
  customLogLevel: Options['customLogLevel'];
  genReqId: Options['genReqId'];
  transport: Options['transport'];
}

const headerValue = (raw: string | string[] | undefined): string | null => {
  if (raw === undefined) return null;
  return Array.isArray(raw) ? raw.join(',') : raw;
};

const customPropsFor4xx = (req: IncomingMessage, res: ServerResponse): Record<string, unknown> => {
  const statusCode = res.statusCode ?? 0;
  if (statusCode >= 400 && statusCode < 500) {
    const url = req.url ?? null;
    const originalUrl =
      'originalUrl' in req && typeof req.originalUrl === 'string' ? req.originalUrl : url;

    return {
      remoteAddress: req.socket?.remoteAddress ?? null,
      xForwardedFor: headerValue(req.headers?.['x-forwarded-for']),
      method: req.method ?? null,
      url,
      originalUrl,
      userAgent: headerValue(req.headers?.['user-agent']),
    };
  }
  return {};
};

/**
 * 按请求与响应状态决定 pino-http 的日志级别
 * - 5xx 或抛错：error
 * - 4xx：warn
 * - /api 与 /graphql 上的写操作成功：info
 * - 其余成功请求（列表查询、健康检查）：静默
 */
export const resolveHttpLogLevel = (
  req: IncomingMessage,
  res: ServerResponse,
  err?: Error,
): 'silent' | 'info' | 'warn' | 'error' => {
  if (req.url === '/favicon.ico') return 'silent';

  if (res.statusCode >= 500 || err) return 'error';
  if (res.statusCode >= 400) return 'warn';

  const url = req.url ?? '';
  const isWrite = req.method === 'POST' || req.method === 'DELETE';
  if (isWrite && (url.startsWith('/api/') || url === '/graphql')) {
    return 'info';
  }
  return 'silent';
};

/**
 * 沿用调用方传入的 x-request-id，否则生成新的 UUID，并回写到响应头
 */
export const resolveRequestId = (req: IncomingMessage, res: ServerResponse): string => {
  const incoming = headerValue(req.headers[REQUEST_ID_HEADER]);
  const id = incoming && incoming.length <= 128 ? incoming : randomUUID();
  res.setHeader(REQUEST_ID_HEADER, id);
  return id;
};

const loggerConfig: ConfigFactory<{ logger: LoggerSettings }> = () => {
  const env = process.env.NODE_ENV || 'development';
  const isTest = env === 'test';
  const isDev = env !== 'production';
  const logPath = process.env.LOG_PATH || (isDev ? './logs' : '/var/log/backend');
  const defaultLevel = isTest ? 'silent' : isDev ? 'debug' : 'info';

  return {
    logger: {
      level: process.env.LOG_LEVEL || defaultLevel,
      redactFields: ['req.headers.authorization', 'req.headers.cookie'],
      customProps: customPropsFor4xx,
      customLogLevel: resolveHttpLogLevel,
      genReqId: resolveRequestId,
      // 测试环境不启用 transport，避免 worker 线程残留
      transport: isTest
        ? undefined
        : isDev
          ? {
              target: 'pino-pretty',
              options: {
                colorize: true,
                translateTime: 'SYS:dd HH:MM:ss',
                messageFormat: '{time} - [{context}] {method} {url} {statusCode} - {msg}',
                ignore: 'hostname,pid,req,context',
              },
            }
          : {
              targets: [
                {
                  target: 'pino/file',
                  options: {
                    destination: `${logPath}/app.log`,
                    mkdir: true,
                  },
                  level: 'info',
                },
                {
                  target: 'pino/file',
                  options: {
                    destination: `${logPath}/error.log`,
                    mkdir: true,
                  },
                  level: 'error',
                },
              ],
            },
    },
  };
};

export default loggerConfig;
