// src/adapters/http/activities/dto/unregister-from-activity.query.ts
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

/**
 * DELETE /api/activities/:name/unregister 查询参数
 */
export class UnregisterFromActivityQuery {
  @IsString()
  @IsNotEmpty()
  @MaxLength(254)
  readonly email!: string;
}
