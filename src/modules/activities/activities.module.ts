// src/modules/activities/activities.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ActivityDirectoryService } from './activity-directory.service';
import { loadActivitySeed } from './activity-seed.loader';
import { ACTIVITIES_TOKENS } from './activities.tokens';

/**
 * 活动目录模块
 * 目录服务为单例，进程启动时由种子数据初始化一次
 */
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: ACTIVITIES_TOKENS.ACTIVITY_SEED,
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        loadActivitySeed(config.get<string>('activities.seedPath', '')),
    },
    ActivityDirectoryService,
  ],
  exports: [ActivityDirectoryService],
})
export class ActivitiesModule {}
