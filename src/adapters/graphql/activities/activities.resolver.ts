// src/adapters/graphql/activities/activities.resolver.ts
import type { NamedActivityView } from '@app-types/models/activity.types';
import { ValidateInput } from '@core/common/errors/validate-input.decorator';
import { Args, Mutation, Query, Resolver } from '@nestjs/graphql';
import { GetActivityUsecase } from '@usecases/activities/get-activity.usecase';
import { ListActivitiesUsecase } from '@usecases/activities/list-activities.usecase';
import { SignupForActivityUsecase } from '@usecases/activities/signup-for-activity.usecase';
import { UnregisterFromActivityUsecase } from '@usecases/activities/unregister-from-activity.usecase';
import { ActivityMembershipInputGql } from './dto/activity-membership.input';
import { ActivityMessageResultGql } from './dto/activity-message.result';
import { ActivityGql } from './dto/activity.dto';

const toActivityGql = (view: NamedActivityView): ActivityGql => ({
  name: view.name,
  description: view.description,
  schedule: view.schedule,
  maxParticipants: view.maxParticipants,
  participants: view.participants,
  spotsLeft: view.maxParticipants - view.participants.length,
});

/**
 * 活动 GraphQL Resolver
 * 适配器层：与 REST Controller 共用同一组 usecase
 */
@Resolver(() => ActivityGql)
export class ActivitiesResolver {
  constructor(
    private readonly listActivitiesUsecase: ListActivitiesUsecase,
    private readonly getActivityUsecase: GetActivityUsecase,
    private readonly signupUsecase: SignupForActivityUsecase,
    private readonly unregisterUsecase: UnregisterFromActivityUsecase,
  ) {}

  @Query(() => [ActivityGql], { name: 'activities' })
  activities(): ActivityGql[] {
    const snapshot = this.listActivitiesUsecase.execute();
    return Object.entries(snapshot).map(([name, view]) => toActivityGql({ name, ...view }));
  }

  @Query(() => ActivityGql, { name: 'activity' })
  activity(@Args('name', { type: () => String }) name: string): ActivityGql {
    return toActivityGql(this.getActivityUsecase.execute(name));
  }

  @ValidateInput()
  @Mutation(() => ActivityMessageResultGql, { name: 'signupForActivity' })
  async signupForActivity(
    @Args('input') input: ActivityMembershipInputGql,
  ): Promise<ActivityMessageResultGql> {
    return this.signupUsecase.execute({ activityName: input.activityName, email: input.email });
  }

  @ValidateInput()
  @Mutation(() => ActivityMessageResultGql, { name: 'unregisterFromActivity' })
  async unregisterFromActivity(
    @Args('input') input: ActivityMembershipInputGql,
  ): Promise<ActivityMessageResultGql> {
    return this.unregisterUsecase.execute({
      activityName: input.activityName,
      email: input.email,
    });
  }
}
