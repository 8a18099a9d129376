// src/core/config/env.validation.ts
import { formatValidationErrors } from '@core/common/errors/validation.formatter';
import { plainToInstance } from 'class-transformer';
import { IsIn, IsInt, IsOptional, Max, Min, validateSync } from 'class-validator';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
const BOOLEAN_FLAGS = ['true', 'false'] as const;

/**
 * 启动时校验的环境变量
 * 只校验有取值约束的变量，其余变量原样保留
 */
class EnvironmentVariables {
  @IsOptional()
  @IsIn(['development', 'production', 'test'])
  NODE_ENV?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  APP_PORT?: number;

  @IsOptional()
  @IsIn(LOG_LEVELS)
  LOG_LEVEL?: string;

  @IsOptional()
  @IsIn(BOOLEAN_FLAGS)
  APP_CORS_ENABLED?: string;

  @IsOptional()
  @IsIn(BOOLEAN_FLAGS)
  GRAPHQL_INTROSPECTION?: string;
}

/**
 * ConfigModule 的 validate 钩子
 * @throws Error 存在非法取值时中止启动
 */
export function validateEnvironment(config: Record<string, unknown>): Record<string, unknown> {
  const env = plainToInstance(EnvironmentVariables, config, { enableImplicitConversion: true });
  const errors = validateSync(env, { skipMissingProperties: true });
  if (errors.length > 0) {
    throw new Error(`Invalid environment configuration: ${formatValidationErrors(errors)}`);
  }
  return config;
}
