// src/modules/activities/activity-seed.loader.ts
import type { ActivitySeed } from '@app-types/models/activity.types';
import { ACTIVITY_ERROR, DomainError } from '@core/common/errors';
import { formatValidationErrors } from '@core/common/errors/validation.formatter';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { readFileSync } from 'fs';
import { resolve } from 'path';
import builtInSeed from './activities.seed.json';
import { ActivitySeedEntry } from './dto/activity-seed.entry';

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * 校验活动种子
 * - 字段级：class-validator（非空文本、正整数容量、参与者去重）
 * - 跨字段：名称唯一、初始参与者不超过容量
 * @param raw 反序列化后的种子内容
 * @param source 种子来源（用于错误信息）
 */
export function parseActivitySeed(raw: unknown, source: string): ActivitySeed[] {
  if (!Array.isArray(raw)) {
    throw new DomainError(ACTIVITY_ERROR.INVALID_SEED, `Activity seed must be an array (${source})`);
  }

  const problems: string[] = [];
  const seeds: ActivitySeed[] = [];
  const seenNames = new Set<string>();

  raw.forEach((item: unknown, index: number) => {
    if (!isPlainObject(item)) {
      problems.push(`#${index}: entry must be an object`);
      return;
    }
    const entry = plainToInstance(ActivitySeedEntry, item);
    const errors = validateSync(entry, { whitelist: true, forbidNonWhitelisted: true });
    if (errors.length > 0) {
      problems.push(`#${index}: ${formatValidationErrors(errors)}`);
      return;
    }
    if (seenNames.has(entry.name)) {
      problems.push(`#${index}: duplicate activity name "${entry.name}"`);
      return;
    }
    if (entry.participants.length > entry.maxParticipants) {
      problems.push(`#${index}: "${entry.name}" has more participants than maxParticipants`);
      return;
    }

    seenNames.add(entry.name);
    seeds.push({
      name: entry.name,
      description: entry.description,
      schedule: entry.schedule,
      maxParticipants: entry.maxParticipants,
      participants: [...entry.participants],
    });
  });

  if (problems.length > 0) {
    throw new DomainError(
      ACTIVITY_ERROR.INVALID_SEED,
      `Invalid activity seed (${source})`,
      { problems },
    );
  }
  return seeds;
}

/**
 * 装载活动种子
 * @param seedPath 种子 JSON 文件路径；为空时使用内置种子
 */
export function loadActivitySeed(seedPath?: string): ActivitySeed[] {
  if (!seedPath) {
    return parseActivitySeed(builtInSeed, 'built-in');
  }

  const absolutePath = resolve(seedPath);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(absolutePath, 'utf8'));
  } catch (error: unknown) {
    throw new DomainError(
      ACTIVITY_ERROR.INVALID_SEED,
      `Unable to read activity seed file (${absolutePath})`,
      undefined,
      error,
    );
  }
  return parseActivitySeed(raw, absolutePath);
}
