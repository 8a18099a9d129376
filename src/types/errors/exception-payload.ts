// src/types/errors/exception-payload.ts

/**
 * HttpException 的响应体结构（getResponse() 返回对象时）
 */
export interface ExceptionPayload {
  /** 覆盖 GraphQL extensions.code（大类），很少使用 */
  code?: string;
  /** 业务细分码 */
  errorCode?: string;
  /** 业务可读消息 */
  errorMessage?: string;
  /** Nest HttpException 可能带的 message（string | string[]） */
  message?: string | string[];
  /** 附加信息（如未通过校验的字段） */
  details?: unknown;
  [key: string]: unknown;
}

/**
 * REST 接口统一错误响应体
 */
export interface HttpErrorBody {
  statusCode: number;
  errorCode: string;
  message: string;
  path: string;
  timestamp: string;
  details?: unknown;
}
