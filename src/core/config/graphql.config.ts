// src/core/config/graphql.config.ts
import { ConfigFactory } from '@nestjs/config';

export interface GraphQLSettings {
  /** true 表示仅在内存中生成 schema */
  schemaDestination: string | true;
  introspection: boolean;
  sortSchema: boolean;
  /** 是否在错误响应的 extensions 中附带堆栈 */
  includeStacktrace: boolean;
}

const graphqlConfig: ConfigFactory<{ graphql: GraphQLSettings }> = () => {
  const env = process.env.NODE_ENV || 'development';

  return {
    graphql: {
      // 测试环境下在内存中生成 schema，不落盘
      schemaDestination: env === 'test' ? true : 'src/schema.graphql',
      introspection: process.env.GRAPHQL_INTROSPECTION !== 'false',
      sortSchema: true,
      includeStacktrace:
        process.env.GRAPHQL_STACKTRACE === undefined
          ? env === 'development'
          : process.env.GRAPHQL_STACKTRACE === 'true',
    },
  };
};

export default graphqlConfig;
