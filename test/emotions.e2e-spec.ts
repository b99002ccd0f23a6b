import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { createTestApp } from './support/create-test-app';

describe('emotions', () => {
  let app: INestApplication;

  beforeEach(async () => {
    ({ app } = await createTestApp());
  });

  afterEach(async () => {
    await app.close();
  });

  const logEmotion = (userId: string, emotion: string) =>
    request(app.getHttpServer())
      .post('/emotions')
      .send({ user_id: userId, emotion })
      .expect(201);

  it('returns the log id', async () => {
    const res = await request(app.getHttpServer())
      .post('/emotions')
      .send({ user_id: 'u1', emotion: 'confused', note: 'chapter 3' })
      .expect(201);

    expect(res.body.log_id).toMatch(/^[0-9a-f]{24}$/);
  });

  it('summarizes all logs of a user', async () => {
    await logEmotion('u1', 'happy');
    await logEmotion('u1', 'happy');
    await logEmotion('u1', 'happy');
    await logEmotion('u1', 'sad');
    await logEmotion('u2', 'angry');

    const res = await request(app.getHttpServer())
      .get('/emotions/summary/u1')
      .expect(200);

    expect(res.body).toEqual({
      frequency: { happy: 3, sad: 1 },
      distribution: { happy: 0.75, sad: 0.25 },
      total: 4,
    });
  });

  it('summarizes a user without logs', async () => {
    const res = await request(app.getHttpServer())
      .get('/emotions/summary/u1')
      .expect(200);

    expect(res.body).toEqual({ frequency: {}, distribution: {}, total: 1 });
  });

  it('requires an emotion label', async () => {
    const res = await request(app.getHttpServer())
      .post('/emotions')
      .send({ user_id: 'u1' })
      .expect(400);

    expect(res.body.message).toEqual(['emotion must be a string']);
  });
});
