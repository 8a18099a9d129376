// src/core/config/activities.config.ts
import { ConfigFactory } from '@nestjs/config';

/**
 * 活动目录配置
 * seedPath 为空时使用内置种子数据
 */
const activitiesConfig: ConfigFactory = () => ({
  activities: {
    seedPath: process.env.ACTIVITIES_SEED_PATH || '',
  },
});

export default activitiesConfig;
