// src/core/config/server.config.ts
import { ConfigFactory } from '@nestjs/config';

export interface ServerSettings {
  host: string;
  port: number;
  /** JSON 请求体大小上限（body-parser 格式，如 100kb） */
  bodyLimit: string;
  cors: {
    enabled: boolean;
    /** 为空表示允许任意来源 */
    origins: string[];
    /** 仅在配置了来源时生效 */
    credentials: boolean;
  };
}

/**
 * 解析逗号分隔的来源列表，忽略空项
 */
export const parseOrigins = (raw: string | undefined): string[] =>
  (raw ?? '')
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);

const serverConfig: ConfigFactory<{ server: ServerSettings }> = () => {
  const origins = parseOrigins(process.env.APP_CORS_ORIGINS);
  return {
    server: {
      host: process.env.APP_HOST || '127.0.0.1',
      port: parseInt(process.env.APP_PORT || '3000', 10),
      bodyLimit: process.env.APP_BODY_LIMIT || '100kb',
      cors: {
        enabled: process.env.APP_CORS_ENABLED !== 'false',
        origins,
        // 未限定来源时不允许携带凭证
        credentials: origins.length > 0 && process.env.APP_CORS_CREDENTIALS !== 'false',
      },
    },
  };
};

export default serverConfig;
