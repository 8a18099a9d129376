// src/adapters/graphql/graphql-adapter.module.ts
import { Module } from '@nestjs/common';
import { ActivitiesUsecasesModule } from '@usecases/activities/activities-usecases.module';
import { ActivitiesResolver } from './activities/activities.resolver';

/**
 * GraphQL 适配器模块
 * 仅负责注册 Resolver，业务编排在 usecase 层
 */
@Module({
  imports: [ActivitiesUsecasesModule],
  providers: [ActivitiesResolver],
})
export class GraphQLAdapterModule {}
