// src/usecases/activities/signup-for-activity.usecase.ts
import { ACTIVITY_ERROR, DomainError, isDomainError } from '@core/common/errors';
import { ActivityDirectoryService } from '@modules/activities/activity-directory.service';
import { Injectable } from '@nestjs/common';
import { errorLog } from '@src/utils/logger/templates';
import { PinoLogger } from 'nestjs-pino';
import type { ActivityMembershipInput, ActivityMembershipOutput } from './activity-membership.types';

/**
 * 活动报名用例
 * 职责：
 * - 空白邮箱直接拒绝，其余邮箱原样使用
 * - 委托目录服务完成存在性、重复报名与容量校验
 * - 生成确认文案：Signed up <email> for <activityName>
 */
@Injectable()
export class SignupForActivityUsecase {
  constructor(
    private readonly directory: ActivityDirectoryService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(SignupForActivityUsecase.name);
  }

  async execute(input: ActivityMembershipInput): Promise<ActivityMembershipOutput> {
    // 邮箱按原样保存与比较，仅拒绝空白
    const email = input.email;
    if (email.trim().length === 0) {
      throw new DomainError(ACTIVITY_ERROR.INVALID_EMAIL, 'Email is required');
    }

    try {
      const change = await this.directory.addParticipant(input.activityName, email);
      this.logger.info(
        { activityName: change.activityName, email, participantCount: change.participantCount },
        '报名成功',
      );
      return {
        message: `Signed up ${email} for ${change.activityName}`,
        activityName: change.activityName,
        email,
        participantCount: change.participantCount,
        spotsLeft: change.maxParticipants - change.participantCount,
      };
    } catch (error: unknown) {
      if (isDomainError(error)) {
        this.logger.warn(
          { activityName: input.activityName, email, errorCode: error.code },
          '报名被拒绝',
        );
      } else {
        errorLog(this.logger, '报名失败', {
          error: error instanceof Error ? error.message : String(error),
          activityName: input.activityName,
          email,
        });
      }
      throw error;
    }
  }
}
