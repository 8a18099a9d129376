// src/adapters/graphql/activities/dto/activity-message.result.ts
import { Field, Int, ObjectType } from '@nestjs/graphql';

/**
 * 报名 / 取消报名结果的 GraphQL 输出类型
 * 与 usecase 的输出模型对齐
 */
@ObjectType()
export class ActivityMessageResultGql {
  @Field(() => String)
  readonly message!: string;

  @Field(() => String)
  readonly activityName!: string;

  @Field(() => String)
  readonly email!: string;

  @Field(() => Int)
  readonly participantCount!: number;

  @Field(() => Int)
  readonly spotsLeft!: number;
}
