// src/adapters/http/http-adapter.module.ts
import { Module } from '@nestjs/common';
import { ActivitiesUsecasesModule } from '@usecases/activities/activities-usecases.module';
import { ActivitiesController } from './activities/activities.controller';

/**
 * REST 适配器模块
 */
@Module({
  imports: [ActivitiesUsecasesModule],
  controllers: [ActivitiesController],
})
export class HttpAdapterModule {}
