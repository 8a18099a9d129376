// src/modules/activities/activity-seed.loader.spec.ts
import { ACTIVITY_ERROR } from '@core/common/errors';
import { join } from 'path';
import { loadActivitySeed, parseActivitySeed } from './activity-seed.loader';

const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error: unknown) {
    return error;
  }
  throw new Error('expected function to throw');
};

const validEntry = {
  name: 'Chess Club',
  description: 'Learn strategies and compete in chess tournaments',
  schedule: 'Fridays, 3:30 PM - 5:00 PM',
  maxParticipants: 2,
  participants: ['michael@mergington.edu'],
};

describe('activity-seed.loader', () => {
  describe('loadActivitySeed', () => {
    it('未配置路径时使用内置种子', () => {
      const seeds = loadActivitySeed();
      const names = seeds.map((seed) => seed.name);

      expect(names).toHaveLength(9);
      expect(names).toEqual(
        expect.arrayContaining([
          'Chess Club',
          'Programming Class',
          'Math Club',
          'Art Workshop',
          'Soccer Team',
        ]),
      );
      expect(loadActivitySeed('')).toEqual(seeds);
    });

    it('内置种子中的每个活动都满足基本约束', () => {
      for (const seed of loadActivitySeed()) {
        expect(seed.description.length).toBeGreaterThan(0);
        expect(seed.schedule.length).toBeGreaterThan(0);
        expect(seed.maxParticipants).toBeGreaterThan(0);
        expect(seed.participants.length).toBeLessThanOrEqual(seed.maxParticipants);
      }
    });

    it('应该从 JSON 文件读取种子并原样保留参与者邮箱', () => {
      const seeds = loadActivitySeed(join(__dirname, '../../../test/fixtures/activities.seed.json'));

      expect(seeds).toEqual([
        {
          name: 'Robotics Lab',
          description: 'Build and program small robots for the spring showcase',
          schedule: 'Mondays, 3:30 PM - 5:00 PM',
          maxParticipants: 2,
          participants: ['Lucas.Brown@Mergington.edu'],
        },
        {
          name: 'Debate Team',
          description: 'Practice formal debate and compete with other schools',
          schedule: 'Thursdays, 4:00 PM - 5:30 PM',
          maxParticipants: 16,
          participants: [],
        },
      ]);
    });

    it('文件不存在时应抛出 INVALID_SEED', () => {
      const missing = join(__dirname, 'no-such-seed.json');

      expect(captureError(() => loadActivitySeed(missing))).toMatchObject({
        code: ACTIVITY_ERROR.INVALID_SEED,
        message: `Unable to read activity seed file (${missing})`,
      });
    });
  });

  describe('parseActivitySeed', () => {
    it('非数组内容应被拒绝', () => {
      expect(captureError(() => parseActivitySeed({}, 'inline'))).toMatchObject({
        code: ACTIVITY_ERROR.INVALID_SEED,
        message: 'Activity seed must be an array (inline)',
      });
    });

    it('空数组是合法的种子', () => {
      expect(parseActivitySeed([], 'inline')).toEqual([]);
    });

    it('非对象条目应被报告', () => {
      expect(captureError(() => parseActivitySeed(['Chess Club'], 'inline'))).toMatchObject({
        code: ACTIVITY_ERROR.INVALID_SEED,
        message: 'Invalid activity seed (inline)',
        details: { problems: ['#0: entry must be an object'] },
      });
    });

    it('重复的活动名称应被报告', () => {
      expect(
        captureError(() => parseActivitySeed([validEntry, validEntry], 'inline')),
      ).toMatchObject({
        details: { problems: ['#1: duplicate activity name "Chess Club"'] },
      });
    });

    it('初始参与者超过容量应被报告', () => {
      const crowded = { ...validEntry, maxParticipants: 1, participants: ['a@x.edu', 'b@x.edu'] };

      expect(captureError(() => parseActivitySeed([crowded], 'inline'))).toMatchObject({
        details: { problems: ['#0: "Chess Club" has more participants than maxParticipants'] },
      });
    });

    it('容量必须为正整数', () => {
      const empty = { ...validEntry, maxParticipants: 0, participants: [] };

      expect(captureError(() => parseActivitySeed([empty], 'inline'))).toMatchObject({
        details: { problems: ['#0: maxParticipants must not be less than 1'] },
      });
    });

    it('重复的参与者应被报告', () => {
      const duplicated = { ...validEntry, participants: ['a@x.edu', 'a@x.edu'] };

      expect(captureError(() => parseActivitySeed([duplicated], 'inline'))).toMatchObject({
        details: { problems: ["#0: All participants's elements must be unique"] },
      });
    });

    it('仅大小写不同的参与者视为不同邮箱', () => {
      const mixed = { ...validEntry, maxParticipants: 3, participants: ['a@x.edu', 'A@X.edu'] };

      expect(parseActivitySeed([mixed], 'inline')[0].participants).toEqual(['a@x.edu', 'A@X.edu']);
    });

    it('未知字段应被拒绝', () => {
      const extra = { ...validEntry, room: 'B12' };

      expect(captureError(() => parseActivitySeed([extra], 'inline'))).toMatchObject({
        details: { problems: ['#0: property room should not exist'] },
      });
    });

    it('同一批次中的多个问题应一并报告', () => {
      const blank = { ...validEntry, name: 'Art Workshop', description: '' };

      expect(
        captureError(() => parseActivitySeed([validEntry, 42, blank], 'inline')),
      ).toMatchObject({
        details: {
          problems: ['#1: entry must be an object', '#2: description should not be empty'],
        },
      });
    });
  });
});
