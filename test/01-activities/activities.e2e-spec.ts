// test/01-activities/activities.e2e-spec.ts

import { INestApplication } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import request from 'supertest';
import { AppModule } from '../../src/app.module';
import { activityPath } from '../utils/e2e-graphql-utils';

/**
 * 活动报名 REST 接口 E2E 测试
 * 同一文件内共享一个应用实例，目录状态在用例之间延续
 */
describe('01-Activities REST 接口', () => {
  let app: INestApplication;

  beforeAll(async () => {
    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    }).compile();

    app = moduleFixture.createNestApplication();
    await app.init();
  }, 30000);

  afterAll(async () => {
    if (app) {
      await app.close();
    }
  });

  describe('GET /api/activities', () => {
    it('应返回全部活动及其参与者', async () => {
      const response = await request(app.getHttpServer()).get('/api/activities').expect(200);

      expect(Object.keys(response.body)).toEqual(
        expect.arrayContaining([
          'Chess Club',
          'Programming Class',
          'Math Club',
          'Art Workshop',
          'Soccer Team',
        ]),
      );
      expect(response.body['Chess Club']).toEqual({
        description: 'Learn strategies and compete in chess tournaments',
        schedule: 'Fridays, 3:30 PM - 5:00 PM',
        maxParticipants: 12,
        participants: ['michael@mergington.edu', 'daniel@mergington.edu'],
      });
    });

    it('每个活动都有非空描述、时间与正数容量', async () => {
      const response = await request(app.getHttpServer()).get('/api/activities').expect(200);
      const activities: Record<string, { description: string; schedule: string; maxParticipants: number }> =
        response.body;

      for (const activity of Object.values(activities)) {
        expect(activity.description.length).toBeGreaterThan(0);
        expect(activity.schedule.length).toBeGreaterThan(0);
        expect(activity.maxParticipants).toBeGreaterThan(0);
      }
    });
  });

  describe('GET /api/activities/:name', () => {
    it('应返回单个活动', async () => {
      const response = await request(app.getHttpServer())
        .get(activityPath('Science Olympiad'))
        .expect(200);

      expect(response.body).toMatchObject({ name: 'Science Olympiad', participants: [] });
    });

    it('未知活动返回 404', async () => {
      const response = await request(app.getHttpServer()).get(activityPath('Knitting')).expect(404);

      expect(response.body).toMatchObject({
        statusCode: 404,
        errorCode: 'ACTIVITY_NOT_FOUND',
        message: 'Activity not found',
      });
    });
  });

  describe('报名与取消报名完整流程', () => {
    const chess = 'Chess Club';

    it('首次报名返回 200 及确认文案', async () => {
      const response = await request(app.getHttpServer())
        .post(activityPath(chess, 'signup'))
        .send({ email: 'a@x.edu' })
        .expect(200);

      expect(response.body).toEqual({ message: 'Signed up a@x.edu for Chess Club' });
    });

    it('报名后列表中可以看到该邮箱', async () => {
      const response = await request(app.getHttpServer()).get('/api/activities').expect(200);
      expect(response.body[chess].participants).toContain('a@x.edu');
    });

    it('重复报名返回 400', async () => {
      const response = await request(app.getHttpServer())
        .post(activityPath(chess, 'signup'))
        .send({ email: 'a@x.edu' })
        .expect(400);

      expect(response.body).toMatchObject({
        statusCode: 400,
        errorCode: 'ALREADY_SIGNED_UP',
        message: 'Student is already signed up for this activity',
        path: '/api/activities/Chess%20Club/signup',
      });
    });

    it('取消报名返回 200 及确认文案', async () => {
      const response = await request(app.getHttpServer())
        .delete(activityPath(chess, 'unregister'))
        .query({ email: 'a@x.edu' })
        .expect(200);

      expect(response.body).toEqual({ message: 'Unregistered a@x.edu from Chess Club' });
    });

    it('取消报名后列表中不再有该邮箱', async () => {
      const response = await request(app.getHttpServer()).get('/api/activities').expect(200);
      expect(response.body[chess].participants).toEqual([
        'michael@mergington.edu',
        'daniel@mergington.edu',
      ]);
    });

    it('再次取消报名返回 404', async () => {
      const response = await request(app.getHttpServer())
        .delete(activityPath(chess, 'unregister'))
        .query({ email: 'a@x.edu' })
        .expect(404);

      expect(response.body).toMatchObject({
        errorCode: 'NOT_SIGNED_UP',
        message: 'Student is not signed up for this activity',
      });
    });
  });

  describe('未知活动', () => {
    it('报名未知活动返回 404', async () => {
      const response = await request(app.getHttpServer())
        .post(activityPath('Knitting', 'signup'))
        .send({ email: 'a@x.edu' })
        .expect(404);

      expect(response.body.errorCode).toBe('ACTIVITY_NOT_FOUND');
    });

    it('取消未知活动的报名返回 404', async () => {
      const response = await request(app.getHttpServer())
        .delete(activityPath('Knitting', 'unregister'))
        .query({ email: 'a@x.edu' })
        .expect(404);

      expect(response.body.errorCode).toBe('ACTIVITY_NOT_FOUND');
    });
  });

  describe('邮箱原样保存', () => {
    it('确认文案与名单中的邮箱与提交时完全一致', async () => {
      await request(app.getHttpServer())
        .post(activityPath('Art Workshop', 'signup'))
        .send({ email: 'Alice.Smith@X.edu' })
        .expect(200)
        .expect({ message: 'Signed up Alice.Smith@X.edu for Art Workshop' });

      const response = await request(app.getHttpServer()).get('/api/activities').expect(200);
      expect(response.body['Art Workshop'].participants).toEqual([
        'amelia@mergington.edu',
        'harper@mergington.edu',
        'Alice.Smith@X.edu',
      ]);
    });

    it('仅大小写不同的邮箱视为不同参与者', async () => {
      await request(app.getHttpServer())
        .post(activityPath('Art Workshop', 'signup'))
        .send({ email: 'alice.smith@x.edu' })
        .expect(200)
        .expect({ message: 'Signed up alice.smith@x.edu for Art Workshop' });

      const response = await request(app.getHttpServer())
        .post(activityPath('Art Workshop', 'signup'))
        .send({ email: 'Alice.Smith@X.edu' })
        .expect(400);
      expect(response.body.errorCode).toBe('ALREADY_SIGNED_UP');
    });

    it('只有空格的邮箱返回 400 INVALID_EMAIL', async () => {
      const response = await request(app.getHttpServer())
        .post(activityPath('Art Workshop', 'signup'))
        .send({ email: '   ' })
        .expect(400);

      expect(response.body).toMatchObject({ errorCode: 'INVALID_EMAIL', message: 'Email is required' });
    });
  });

  describe('容量限制', () => {
    it('满员后报名返回 400 ACTIVITY_FULL 且名单不变', async () => {
      // Math Club 容量 10，已有 2 人
      for (let i = 0; i < 8; i += 1) {
        await request(app.getHttpServer())
          .post(activityPath('Math Club', 'signup'))
          .send({ email: `student${i}@mergington.edu` })
          .expect(200);
      }

      const response = await request(app.getHttpServer())
        .post(activityPath('Math Club', 'signup'))
        .send({ email: 'late@mergington.edu' })
        .expect(400);
      expect(response.body).toMatchObject({ errorCode: 'ACTIVITY_FULL', message: 'Activity is full' });

      const list = await request(app.getHttpServer()).get('/api/activities').expect(200);
      expect(list.body['Math Club'].participants).toHaveLength(10);
      expect(list.body['Math Club'].participants).not.toContain('late@mergington.edu');
    });
  });

  describe('请求校验', () => {
    it('缺少 email 的请求体返回 400', async () => {
      const response = await request(app.getHttpServer())
        .post(activityPath('Gym Class', 'signup'))
        .send({})
        .expect(400);

      expect(response.body).toMatchObject({ statusCode: 400, errorCode: 'BAD_REQUEST' });
    });

    it('email 不是字符串时返回 400', async () => {
      const response = await request(app.getHttpServer())
        .post(activityPath('Gym Class', 'signup'))
        .send({ email: 42 })
        .expect(400);

      expect(response.body.errorCode).toBe('BAD_REQUEST');
    });

    it('请求体包含未知字段时返回 400', async () => {
      const response = await request(app.getHttpServer())
        .post(activityPath('Gym Class', 'signup'))
        .send({ email: 'a@x.edu', role: 'admin' })
        .expect(400);

      expect(response.body).toMatchObject({
        errorCode: 'BAD_REQUEST',
        message: 'property role should not exist',
        details: { fields: ['role'] },
      });
    });

    it('取消报名缺少 email 查询参数时返回 400', async () => {
      const response = await request(app.getHttpServer())
        .delete(activityPath('Gym Class', 'unregister'))
        .expect(400);

      expect(response.body.errorCode).toBe('BAD_REQUEST');
    });
  });

  describe('响应信封', () => {
    it('报名成功时包装为 { success, data }', async () => {
      const response = await request(app.getHttpServer())
        .post(activityPath('Drama Club', 'signup'))
        .set('x-response-format', 'envelope')
        .send({ email: 'b@x.edu' })
        .expect(200);

      expect(response.body).toMatchObject({
        success: true,
        data: { message: 'Signed up b@x.edu for Drama Club' },
      });
    });

    it('业务错误时包装为 { success: false, errorCode }', async () => {
      const response = await request(app.getHttpServer())
        .post(activityPath('Drama Club', 'signup'))
        .set('x-response-format', 'envelope')
        .send({ email: 'b@x.edu' })
        .expect(400);

      expect(response.body).toMatchObject({
        success: false,
        data: null,
        errorCode: 'ALREADY_SIGNED_UP',
        errorMessage: 'Student is already signed up for this activity',
      });
    });
  });
});
