// src/core/common/errors/validate-input.decorator.ts

import { BadRequestException, UsePipes, ValidationPipe } from '@nestjs/common';
import { ValidationError } from 'class-validator';
import { COMMON_ERROR } from './domain-error';
import { collectInvalidFields, formatValidationErrors } from './validation.formatter';

/**
 * 校验失败时抛出的 400 异常
 * 响应体携带业务码与未通过校验的字段，由全局异常过滤器透传
 */
export const createValidationException = (errors: ValidationError[]): BadRequestException =>
  new BadRequestException({
    errorCode: COMMON_ERROR.BAD_REQUEST,
    message: formatValidationErrors(errors),
    details: { fields: collectInvalidFields(errors) },
  });

/**
 * 输入验证装饰器
 * 用于 Controller 与 Resolver 方法：剔除未声明字段，出现未知字段直接拒绝
 */
// eslint-disable-next-line @typescript-eslint/naming-convention
export const ValidateInput = () =>
  UsePipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      validationError: { target: false, value: false },
      exceptionFactory: createValidationException,
    }),
  );
