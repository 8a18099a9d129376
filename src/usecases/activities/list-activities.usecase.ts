// src/usecases/activities/list-activities.usecase.ts
import type { ActivityDirectorySnapshot } from '@app-types/models/activity.types';
import { ActivityDirectoryService } from '@modules/activities/activity-directory.service';
import { Injectable } from '@nestjs/common';

/**
 * 列出全部活动用例
 * 返回名称 → 活动（含当前参与者）的快照，无副作用
 */
@Injectable()
export class ListActivitiesUsecase {
  constructor(private readonly directory: ActivityDirectoryService) {}

  execute(): ActivityDirectorySnapshot {
    return this.directory.list();
  }
}
