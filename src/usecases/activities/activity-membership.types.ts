// src/usecases/activities/activity-membership.types.ts

/**
 * 报名 / 取消报名用例的输入
 */
export interface ActivityMembershipInput {
  readonly activityName: string;
  readonly email: string;
}

/**
 * 报名 / 取消报名用例的输出
 * message 为面向用户的确认文案，其余字段供适配层按需暴露
 */
export interface ActivityMembershipOutput {
  readonly message: string;
  readonly activityName: string;
  /** 与提交时一致的邮箱 */
  readonly email: string;
  readonly participantCount: number;
  readonly spotsLeft: number;
}
