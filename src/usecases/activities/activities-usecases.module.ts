// src/usecases/activities/activities-usecases.module.ts
import { Module } from '@nestjs/common';
import { ActivitiesModule } from '@modules/activities/activities.module';
import { GetActivityUsecase } from './get-activity.usecase';
import { ListActivitiesUsecase } from './list-activities.usecase';
import { SignupForActivityUsecase } from './signup-for-activity.usecase';
import { UnregisterFromActivityUsecase } from './unregister-from-activity.usecase';

/**
 * 活动报名用例模块
 * 汇总活动相关用例，供 HTTP 与 GraphQL 适配层共同使用
 */
@Module({
  imports: [ActivitiesModule],
  providers: [
    ListActivitiesUsecase,
    GetActivityUsecase,
    SignupForActivityUsecase,
    UnregisterFromActivityUsecase,
  ],
  exports: [
    ListActivitiesUsecase,
    GetActivityUsecase,
    SignupForActivityUsecase,
    UnregisterFromActivityUsecase,
  ],
})
export class ActivitiesUsecasesModule {}
