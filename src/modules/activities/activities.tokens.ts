// src/modules/activities/activities.tokens.ts
export const ACTIVITIES_TOKENS = {
  /** 启动时装载的活动种子数据（已校验） */
  ACTIVITY_SEED: Symbol('ACTIVITIES.ACTIVITY_SEED'),
} as const;
