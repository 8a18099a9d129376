// src/adapters/http/activities/activities.controller.ts
import type {
  ActivityDirectorySnapshot,
  NamedActivityView,
} from '@app-types/models/activity.types';
import { ValidateInput } from '@core/common/errors/validate-input.decorator';
import { Body, Controller, Delete, Get, HttpCode, Param, Post, Query } from '@nestjs/common';
import { GetActivityUsecase } from '@usecases/activities/get-activity.usecase';
import { ListActivitiesUsecase } from '@usecases/activities/list-activities.usecase';
import { SignupForActivityUsecase } from '@usecases/activities/signup-for-activity.usecase';
import { UnregisterFromActivityUsecase } from '@usecases/activities/unregister-from-activity.usecase';
import type { ActivityMessageResult } from './dto/activity-message.result';
import { SignupForActivityBody } from './dto/signup-for-activity.body';
import { UnregisterFromActivityQuery } from './dto/unregister-from-activity.query';

/**
 * 活动报名 REST Controller
 * 适配器层：路径参数中的活动名称由 Express 完成 URL 解码后原样传给 usecase，
 * 业务错误由全局异常过滤器映射为 HTTP 状态码。
 */
@Controller('api/activities')
export class ActivitiesController {
  constructor(
    private readonly listActivitiesUsecase: ListActivitiesUsecase,
    private readonly getActivityUsecase: GetActivityUsecase,
    private readonly signupUsecase: SignupForActivityUsecase,
    private readonly unregisterUsecase: UnregisterFromActivityUsecase,
  ) {}

  /**
   * 获取全部活动：名称 → { description, schedule, maxParticipants, participants }
   */
  @Get()
  listActivities(): ActivityDirectorySnapshot {
    return this.listActivitiesUsecase.execute();
  }

  @Get(':name')
  getActivity(@Param('name') name: string): NamedActivityView {
    return this.getActivityUsecase.execute(name);
  }

  /**
   * 报名活动
   * 404：活动不存在；400：重复报名 / 活动已满 / 请求体非法
   */
  @Post(':name/signup')
  @HttpCode(200)
  @ValidateInput()
  async signupForActivity(
    @Param('name') name: string,
    @Body() body: SignupForActivityBody,
  ): Promise<ActivityMessageResult> {
    const result = await this.signupUsecase.execute({ activityName: name, email: body.email });
    return { message: result.message };
  }

  /**
   * 取消报名
   * 404：活动不存在 / 邮箱未报名该活动
   */
  @Delete(':name/unregister')
  @ValidateInput()
  async unregisterFromActivity(
    @Param('name') name: string,
    @Query() query: UnregisterFromActivityQuery,
  ): Promise<ActivityMessageResult> {
    const result = await this.unregisterUsecase.execute({
      activityName: name,
      email: query.email,
    });
    return { message: result.message };
  }
}
