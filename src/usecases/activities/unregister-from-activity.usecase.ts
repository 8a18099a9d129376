// src/usecases/activities/unregister-from-activity.usecase.ts
import { ACTIVITY_ERROR, DomainError, isDomainError } from '@core/common/errors';
import { ActivityDirectoryService } from '@modules/activities/activity-directory.service';
import { Injectable } from '@nestjs/common';
import { errorLog } from '@src/utils/logger/templates';
import { PinoLogger } from 'nestjs-pino';
import type { ActivityMembershipInput, ActivityMembershipOutput } from './activity-membership.types';

/**
 * 取消活动报名用例
 * 活动不存在或邮箱未报名时均抛出 DomainError（适配层映射为 404）
 */
@Injectable()
export class UnregisterFromActivityUsecase {
  constructor(
    private readonly directory: ActivityDirectoryService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(UnregisterFromActivityUsecase.name);
  }

  async execute(input: ActivityMembershipInput): Promise<ActivityMembershipOutput> {
    // 邮箱按原样保存与比较，仅拒绝空白
    const email = input.email;
    if (email.trim().length === 0) {
      throw new DomainError(ACTIVITY_ERROR.INVALID_EMAIL, 'Email is required');
    }

    try {
      const change = await this.directory.removeParticipant(input.activityName, email);
      this.logger.info(
        { activityName: change.activityName, email, participantCount: change.participantCount },
        '取消报名成功',
      );
      return {
        message: `Unregistered ${email} from ${change.activityName}`,
        activityName: change.activityName,
        email,
        participantCount: change.participantCount,
        spotsLeft: change.maxParticipants - change.participantCount,
      };
    } catch (error: unknown) {
      if (isDomainError(error)) {
        this.logger.warn(
          { activityName: input.activityName, email, errorCode: error.code },
          '取消报名被拒绝',
        );
      } else {
        errorLog(this.logger, '取消报名失败', {
          error: error instanceof Error ? error.message : String(error),
          activityName: input.activityName,
          email,
        });
      }
      throw error;
    }
  }
}
