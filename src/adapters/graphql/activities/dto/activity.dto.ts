// src/adapters/graphql/activities/dto/activity.dto.ts
import { Field, Int, ObjectType } from '@nestjs/graphql';

/**
 * 活动的 GraphQL 输出类型
 */
@ObjectType({ description: '课外活动' })
export class ActivityGql {
  @Field(() => String)
  readonly name!: string;

  @Field(() => String)
  readonly description!: string;

  @Field(() => String, { description: '活动时间（可读文本）' })
  readonly schedule!: string;

  @Field(() => Int)
  readonly maxParticipants!: number;

  @Field(() => [String], { description: '已报名邮箱，按报名先后排序' })
  readonly participants!: string[];

  @Field(() => Int, { description: '剩余名额' })
  readonly spotsLeft!: number;
}
