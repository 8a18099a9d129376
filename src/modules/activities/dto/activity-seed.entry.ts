// src/modules/activities/dto/activity-seed.entry.ts
import {
  ArrayUnique,
  IsArray,
  IsInt,
  IsNotEmpty,
  IsString,
  MaxLength,
  Min,
} from 'class-validator';

/**
 * 种子文件中的单条活动
 * 仅做字段级校验；跨字段约束（容量、名称唯一）由装载器检查
 */
export class ActivitySeedEntry {
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  name!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(500)
  description!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  schedule!: string;

  @IsInt()
  @Min(1)
  maxParticipants!: number;

  @IsArray()
  @IsString({ each: true })
  @IsNotEmpty({ each: true })
  @ArrayUnique()
  participants!: string[];
}
