// src/adapters/graphql/activities/dto/activity-membership.input.ts
import { Field, InputType } from '@nestjs/graphql';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

/**
 * 报名 / 取消报名的 GraphQL 输入
 */
@InputType()
export class ActivityMembershipInputGql {
  /** 活动名称（精确匹配） */
  @Field(() => String)
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  readonly activityName!: string;

  /** 学生邮箱 */
  @Field(() => String)
  @IsString()
  @IsNotEmpty()
  @MaxLength(254)
  readonly email!: string;
}
