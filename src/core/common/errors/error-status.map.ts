// src/core/common/errors/error-status.map.ts
import { ACTIVITY_ERROR, COMMON_ERROR } from './domain-error';

/**
 * 业务错误码 → HTTP 状态码
 * 未登记的错误码按 400 处理
 */
const DOMAIN_ERROR_STATUS: Readonly<Record<string, number>> = {
  [ACTIVITY_ERROR.ACTIVITY_NOT_FOUND]: 404,
  [ACTIVITY_ERROR.NOT_SIGNED_UP]: 404,
  [ACTIVITY_ERROR.ALREADY_SIGNED_UP]: 400,
  [ACTIVITY_ERROR.ACTIVITY_FULL]: 400,
  [ACTIVITY_ERROR.INVALID_EMAIL]: 400,
  // 种子数据错误只会在启动阶段出现
  [ACTIVITY_ERROR.INVALID_SEED]: 500,
  [COMMON_ERROR.BAD_REQUEST]: 400,
  [COMMON_ERROR.NOT_FOUND]: 404,
  [COMMON_ERROR.INTERNAL_ERROR]: 500,
};

export function mapDomainErrorToHttpStatus(errorCode: string): number {
  return DOMAIN_ERROR_STATUS[errorCode] ?? 400;
}

/**
 * 将 HTTP 状态码映射为 GraphQL 标准错误类别代码（extensions.code）
 * 注意：这是 GraphQL/Apollo 通用的大类，不是业务 errorCode
 */
export function mapHttpToGqlCode(status: number): string {
  switch (status) {
    case 400:
    case 422:
      return 'BAD_USER_INPUT';
    case 401:
      return 'UNAUTHENTICATED';
    case 403:
      return 'FORBIDDEN';
    case 404:
      return 'NOT_FOUND';
    case 409:
      return 'CONFLICT';
    default:
      return 'INTERNAL_SERVER_ERROR';
  }
}

/**
 * HTTP 异常没有业务码时，按状态码给出兜底 errorCode
 */
export function fallbackErrorCodeForStatus(status: number): string {
  if (status === 404) return COMMON_ERROR.NOT_FOUND;
  if (status >= 500) return COMMON_ERROR.INTERNAL_ERROR;
  return COMMON_ERROR.BAD_REQUEST;
}
