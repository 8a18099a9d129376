// src/adapters/http/activities/dto/activity-message.result.ts

/**
 * 报名 / 取消报名的 REST 响应体
 */
export interface ActivityMessageResult {
  message: string;
}
