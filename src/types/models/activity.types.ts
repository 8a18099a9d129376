// src/types/models/activity.types.ts

/**
 * 课外活动的只读视图
 * participants 保持报名先后顺序
 */
export interface ActivityView {
  readonly description: string;
  readonly schedule: string;
  readonly maxParticipants: number;
  readonly participants: string[];
}

/**
 * 带名称的活动视图（单个查询、GraphQL 列表使用）
 */
export interface NamedActivityView extends ActivityView {
  readonly name: string;
}

/**
 * 活动名称 → 活动视图 的映射，REST 列表接口直接以此为响应体
 */
export type ActivityDirectorySnapshot = Record<string, ActivityView>;

/**
 * 种子数据中的单条活动定义
 */
export interface ActivitySeed {
  name: string;
  description: string;
  schedule: string;
  maxParticipants: number;
  participants: string[];
}

/**
 * 报名 / 取消报名的结果
 */
export interface MembershipChange {
  readonly activityName: string;
  readonly email: string;
  /** 变更后的报名人数 */
  readonly participantCount: number;
  readonly maxParticipants: number;
}
