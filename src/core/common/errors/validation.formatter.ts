// src/core/common/errors/validation.formatter.ts

import { ValidationError } from 'class-validator';

/**
 * 展开验证错误（含嵌套属性）为消息列表
 */
export function collectValidationMessages(errors: ValidationError[]): string[] {
  return errors.flatMap((error) => [
    ...Object.values(error.constraints ?? {}),
    ...collectValidationMessages(error.children ?? []),
  ]);
}

/**
 * 列出未通过校验的字段路径，嵌套字段以 "." 连接
 */
export function collectInvalidFields(errors: ValidationError[], parent?: string): string[] {
  return errors.flatMap((error) => {
    const path = parent ? `${parent}.${error.property}` : error.property;
    const own = error.constraints && Object.keys(error.constraints).length > 0 ? [path] : [];
    return [...own, ...collectInvalidFields(error.children ?? [], path)];
  });
}

/**
 * 格式化验证错误消息，以 "; " 连接
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  return collectValidationMessages(errors).join('; ');
}
