// src/usecases/activities/get-activity.usecase.ts
import type { NamedActivityView } from '@app-types/models/activity.types';
import { ActivityDirectoryService } from '@modules/activities/activity-directory.service';
import { Injectable } from '@nestjs/common';

/**
 * 查询单个活动用例
 */
@Injectable()
export class GetActivityUsecase {
  constructor(private readonly directory: ActivityDirectoryService) {}

  /**
   * @param activityName 活动名称（精确匹配）
   * @throws DomainError ACTIVITY_NOT_FOUND
   */
  execute(activityName: string): NamedActivityView {
    return this.directory.getByNameOrThrow(activityName);
  }
}
