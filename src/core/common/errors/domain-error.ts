// src/core/common/errors/domain-error.ts
// 领域错误与错误码：跨层共享的核心错误定义

/**
 * 领域错误类
 * 用于表示业务逻辑层的错误，可在 Service、Usecase 和 Adapter 层之间传递
 */
export class DomainError extends Error {
  readonly code: string;
  readonly details?: unknown;
  readonly cause?: unknown;

  constructor(code: string, message: string, details?: unknown, cause?: unknown) {
    super(message);
    this.name = 'DomainError';
    this.code = code;
    this.details = details;
    this.cause = cause;

    // 兼容某些编译目标/测试环境的原型链问题，确保 instanceof 正常
    Object.setPrototypeOf(this, new.target.prototype);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DomainError);
    }
  }

  toJSON() {
    return { name: this.name, code: this.code, message: this.message, details: this.details };
  }
}

// 活动报名领域错误码
export const ACTIVITY_ERROR = {
  ACTIVITY_NOT_FOUND: 'ACTIVITY_NOT_FOUND',
  ALREADY_SIGNED_UP: 'ALREADY_SIGNED_UP',
  NOT_SIGNED_UP: 'NOT_SIGNED_UP',
  ACTIVITY_FULL: 'ACTIVITY_FULL',
  INVALID_EMAIL: 'INVALID_EMAIL',
  INVALID_SEED: 'INVALID_SEED',
} as const;
Object.freeze(ACTIVITY_ERROR);

// 通用错误码（协议层兜底）
export const COMMON_ERROR = {
  BAD_REQUEST: 'BAD_REQUEST',
  NOT_FOUND: 'NOT_FOUND',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;
Object.freeze(COMMON_ERROR);

// 类型辅助
export type ActivityErrorCode = (typeof ACTIVITY_ERROR)[keyof typeof ACTIVITY_ERROR];
export type CommonErrorCode = (typeof COMMON_ERROR)[keyof typeof COMMON_ERROR];

// 类型守卫：统一判断是否为领域错误（兼容多包/反序列化场景）
export const isDomainError = (error: unknown): error is DomainError => {
  if (error instanceof DomainError) return true;
  if (!error || typeof error !== 'object') return false;
  return (
    'name' in error &&
    error.name === 'DomainError' &&
    'code' in error &&
    typeof error.code === 'string'
  );
};
