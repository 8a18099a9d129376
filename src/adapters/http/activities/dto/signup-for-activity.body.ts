// src/adapters/http/activities/dto/signup-for-activity.body.ts
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

/**
 * POST /api/activities/:name/signup 请求体
 * 邮箱格式不做严格校验，只要求非空字符串
 */
export class SignupForActivityBody {
  @IsString()
  @IsNotEmpty()
  @MaxLength(254)
  readonly email!: string;
}
