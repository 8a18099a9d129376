// src/core/common/errors/index.ts
// 错误相关导出的统一入口

export * from './domain-error';
export * from './error-status.map';
// 这些是协议 / 框架相关，不要随意 export 避免污染
// export * from './validate-input.decorator';
// export * from './validation.formatter';
