// src/modules/activities/activity-directory.service.ts
import type {
  ActivityDirectorySnapshot,
  ActivitySeed,
  ActivityView,
  MembershipChange,
  NamedActivityView,
} from '@app-types/models/activity.types';
import { KeyedMutex } from '@core/common/concurrency/keyed-mutex';
import { ACTIVITY_ERROR, DomainError } from '@core/common/errors';
import { Inject, Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import { ACTIVITIES_TOKENS } from './activities.tokens';

/**
 * 目录内部持有的活动记录
 * 名称、描述、时间与容量在创建后不再变化，只有参与者集合会变更
 */
interface ActivityRecord {
  readonly name: string;
  readonly description: string;
  readonly schedule: string;
  readonly maxParticipants: number;
  readonly participants: Set<string>;
}

/**
 * 活动目录服务
 * 进程内唯一的活动状态持有者：名称 → 活动记录
 * - 读操作同步复制当前状态，返回的快照与内部状态互不影响
 * - 同一活动的参与者变更通过 KeyedMutex 串行执行
 * 邮箱按原样保存与比较（区分大小写）
 */
@Injectable()
export class ActivityDirectoryService {
  private readonly activities = new Map<string, ActivityRecord>();
  private readonly mutex = new KeyedMutex();

  constructor(
    private readonly logger: PinoLogger,
    @Inject(ACTIVITIES_TOKENS.ACTIVITY_SEED)
    seed: ReadonlyArray<ActivitySeed>,
  ) {
    this.logger.setContext(ActivityDirectoryService.name);
    for (const item of seed) {
      this.activities.set(item.name, {
        name: item.name,
        description: item.description,
        schedule: item.schedule,
        maxParticipants: item.maxParticipants,
        participants: new Set(item.participants),
      });
    }
    this.logger.info({ activityCount: this.activities.size }, '活动目录已初始化');
  }

  /**
   * 获取全部活动（名称 → 活动）的快照
   */
  list(): ActivityDirectorySnapshot {
    // fromEntries 定义自有属性，名称为 __proto__ 的活动同样保留
    return Object.fromEntries(
      [...this.activities.values()].map((record) => [record.name, this.toView(record)]),
    );
  }

  /**
   * 按名称查询单个活动
   * @param name 活动名称（精确匹配）
   * @returns 活动快照，不存在时返回 null
   */
  findByName(name: string): NamedActivityView | null {
    const record = this.activities.get(name);
    return record ? { name: record.name, ...this.toView(record) } : null;
  }

  /**
   * 按名称查询单个活动，不存在则抛出 ACTIVITY_NOT_FOUND
   */
  getByNameOrThrow(name: string): NamedActivityView {
    const found = this.findByName(name);
    if (!found) {
      throw new DomainError(ACTIVITY_ERROR.ACTIVITY_NOT_FOUND, 'Activity not found', {
        activityName: name,
      });
    }
    return found;
  }

  /**
   * 为活动添加参与者
   * 校验顺序：活动存在 → 未重复报名 → 容量未满
   * @param name 活动名称
   * @param email 参与者邮箱
   */
  async addParticipant(name: string, email: string): Promise<MembershipChange> {
    return this.mutex.runExclusive(name, () => {
      const record = this.findRecordOrThrow(name);

      if (record.participants.has(email)) {
        throw new DomainError(
          ACTIVITY_ERROR.ALREADY_SIGNED_UP,
          'Student is already signed up for this activity',
          { activityName: name, email },
        );
      }
      if (record.participants.size >= record.maxParticipants) {
        throw new DomainError(ACTIVITY_ERROR.ACTIVITY_FULL, 'Activity is full', {
          activityName: name,
          maxParticipants: record.maxParticipants,
        });
      }

      record.participants.add(email);
      return this.toChange(record, email);
    });
  }

  /**
   * 从活动中移除参与者
   * @param name 活动名称
   * @param email 参与者邮箱
   */
  async removeParticipant(name: string, email: string): Promise<MembershipChange> {
    return this.mutex.runExclusive(name, () => {
      const record = this.findRecordOrThrow(name);

      if (!record.participants.delete(email)) {
        throw new DomainError(
          ACTIVITY_ERROR.NOT_SIGNED_UP,
          'Student is not signed up for this activity',
          { activityName: name, email },
        );
      }
      return this.toChange(record, email);
    });
  }

  private findRecordOrThrow(name: string): ActivityRecord {
    const record = this.activities.get(name);
    if (!record) {
      throw new DomainError(ACTIVITY_ERROR.ACTIVITY_NOT_FOUND, 'Activity not found', {
        activityName: name,
      });
    }
    return record;
  }

  private toView(record: ActivityRecord): ActivityView {
    return {
      description: record.description,
      schedule: record.schedule,
      maxParticipants: record.maxParticipants,
      participants: [...record.participants],
    };
  }

  private toChange(record: ActivityRecord, email: string): MembershipChange {
    return {
      activityName: record.name,
      email,
      participantCount: record.participants.size,
      maxParticipants: record.maxParticipants,
    };
  }
}
