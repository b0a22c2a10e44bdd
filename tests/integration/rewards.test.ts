import request from 'supertest';
import { describe, it, expect, beforeEach } from 'vitest';
import app from '../../src/app';
import { pool } from '../../src/connections/db/connection';
import { Reward, User } from '../../src/connections/db/models';
import { fileExists } from '../../src/modules/upload/localStorage.service';
import { authHeader, createApplication, createReward, createStaff, createUser } from '../utils/test-helpers';

const findReward = async (id: number): Promise<Reward> => {
  const result = await pool.query<Reward>('SELECT * FROM rewards WHERE id = $1', [id]);
  return result.rows[0];
};

describe('Reward catalog', () => {
  let staff: User;
  let user: User;

  beforeEach(async () => {
    staff = await createStaff();
    user = await createUser();
  });

  it('lists rewards with their application counts', async () => {
    const leader = await createReward('Young Leader', 'For outstanding young leaders');
    await createReward('Golden Pen', 'For journalists');
    await createApplication(user, leader);

    const res = await request(app).get('/api/rewards').set('Authorization', authHeader(user));

    expect(res.status).toBe(200);
    expect(res.body.pagination.total).toBe(2);
    const counts = Object.fromEntries(
      res.body.data.map((item: { name: string; applications_count: number }) => [item.name, item.applications_count])
    );
    expect(counts).toEqual({ 'Young Leader': 1, 'Golden Pen': 0 });
  });

  it('searches names and descriptions', async () => {
    await createReward('Young Leader', 'For outstanding young leaders');
    await createReward('Golden Pen', 'For journalists');

    const res = await request(app).get('/api/rewards?search=JOURNAL').set('Authorization', authHeader(user));

    expect(res.body.data.map((item: { name: string }) => item.name)).toEqual(['Golden Pen']);
  });

  it('splits pending and approved applications on the detail', async () => {
    const reward = await createReward();
    await createApplication(user, reward, { status: 'district' });
    await createApplication(await createUser(), reward, { status: 'awarded' });
    await createApplication(await createUser(), reward, { status: 'rejected' });

    const res = await request(app).get(`/api/rewards/${reward.id}`).set('Authorization', authHeader(user));

    expect(res.status).toBe(200);
    expect(res.body.data).toMatchObject({
      id: reward.id,
      applications_count: 3,
      pending_applications: 1,
      approved_applications: 1,
    });
  });

  it('returns 404 for an unknown reward', async () => {
    const res = await request(app).get('/api/rewards/4242').set('Authorization', authHeader(user));

    expect(res.status).toBe(404);
  });

  it('lets staff create a reward with an image', async () => {
    const res = await request(app)
      .post('/api/rewards')
      .set('Authorization', authHeader(staff))
      .field('name', 'Golden Pen')
      .field('description', 'For journalists')
      .attach('image', Buffer.from('fake-png'), { filename: 'pen.png', contentType: 'image/png' });

    expect(res.status).toBe(201);
    expect(res.body.data).toMatchObject({ name: 'Golden Pen', applications_count: 0 });
    expect(res.body.data.image).toMatch(/^rewards\/.+\.png$/);
    expect(await fileExists(res.body.data.image)).toBe(true);
  });

  it('refuses reward management to regular users', async () => {
    const res = await request(app)
      .post('/api/rewards')
      .set('Authorization', authHeader(user))
      .send({ name: 'Golden Pen', description: 'For journalists' });

    expect(res.status).toBe(403);
  });

  it('rejects a duplicate name regardless of case', async () => {
    await createReward('Golden Pen', 'For journalists');

    const res = await request(app)
      .post('/api/rewards')
      .set('Authorization', authHeader(staff))
      .send({ name: 'golden pen', description: 'Another one' });

    expect(res.status).toBe(400);
    expect(res.body.error.details).toEqual({ name: ['Reward with this name already exists.'] });
  });

  it('rejects an image of the wrong type', async () => {
    const res = await request(app)
      .post('/api/rewards')
      .set('Authorization', authHeader(staff))
      .field('name', 'Golden Pen')
      .field('description', 'For journalists')
      .attach('image', Buffer.from('GIF89a'), { filename: 'pen.gif', contentType: 'image/gif' });

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('UPLOAD_ERROR');
  });

  it('updates fields and replaces the image', async () => {
    const created = await request(app)
      .post('/api/rewards')
      .set('Authorization', authHeader(staff))
      .field('name', 'Golden Pen')
      .field('description', 'For journalists')
      .attach('image', Buffer.from('old'), { filename: 'old.png', contentType: 'image/png' })
      .expect(201);
    const oldImage: string = created.body.data.image;

    const res = await request(app)
      .patch(`/api/rewards/${created.body.data.id}`)
      .set('Authorization', authHeader(staff))
      .field('description', 'For investigative journalists')
      .attach('image', Buffer.from('new'), { filename: 'new.webp', contentType: 'image/webp' });

    expect(res.status).toBe(200);
    expect(res.body.data).toMatchObject({ name: 'Golden Pen', description: 'For investigative journalists' });
    expect(res.body.data.image).toMatch(/\.webp$/);
    expect(await fileExists(oldImage)).toBe(false);
  });

  it('refuses to delete a reward that has applications', async () => {
    const reward = await createReward();
    await createApplication(user, reward);

    const res = await request(app).delete(`/api/rewards/${reward.id}`).set('Authorization', authHeader(staff));

    expect(res.status).toBe(400);
    expect(res.body.error).toEqual({ code: 'REWARD_IN_USE', details: { applications_count: 1 } });
    expect(await findReward(reward.id)).toBeDefined();
  });

  it('deletes an unused reward', async () => {
    const reward = await createReward();

    const res = await request(app).delete(`/api/rewards/${reward.id}`).set('Authorization', authHeader(staff));

    expect(res.status).toBe(200);
    expect(await findReward(reward.id)).toBeUndefined();
  });

  it('breaks applications down by status and month', async () => {
    const reward = await createReward();
    await createApplication(user, reward, { status: 'awarded' });
    await createApplication(await createUser(), reward);
    await createApplication(await createUser(), reward, {
      created_at: new Date(Date.now() - 400 * 24 * 60 * 60 * 1000),
    });

    const res = await request(app).get(`/api/rewards/${reward.id}/stats`).set('Authorization', authHeader(staff));

    expect(res.status).toBe(200);
    expect(res.body.data.total_applications).toBe(3);
    expect(res.body.data.status_breakdown).toMatchObject({ submitted: 2, awarded: 1 });
    expect(res.body.data.monthly_applications).toHaveLength(12);
    const counted = res.body.data.monthly_applications.reduce(
      (sum: number, month: { count: number }) => sum + month.count,
      0
    );
    expect(counted).toBe(2);
    expect(res.body.data.monthly_applications[11].count).toBe(2);
  });

  it('lists the applications of one reward for staff', async () => {
    const reward = await createReward();
    const other = await createReward('Golden Pen', 'For journalists');
    const applicationId = await createApplication(user, reward, { area: 'khorezm' });
    await createApplication(user, other);

    const res = await request(app)
      .get(`/api/rewards/${reward.id}/applications?area=khorezm`)
      .set('Authorization', authHeader(staff));

    expect(res.status).toBe(200);
    expect(res.body.data.map((item: { id: number }) => item.id)).toEqual([applicationId]);
    expect(res.body.data[0].area_display).toBe('Khorezm Region');
    expect(res.body.meta).toEqual({ reward: { id: reward.id, name: 'Young Leader' } });
  });
});

describe('Uploaded files', () => {
  it('are served from /uploads', async () => {
    const staff = await createStaff();
    const created = await request(app)
      .post('/api/rewards')
      .set('Authorization', authHeader(staff))
      .field('name', 'Golden Pen')
      .field('description', 'For journalists')
      .attach('image', Buffer.from('png-bytes'), { filename: 'pen.png', contentType: 'image/png' })
      .expect(201);

    const res = await request(app).get(`/uploads/${created.body.data.image}`);

    expect(res.status).toBe(200);
    expect(Buffer.isBuffer(res.body) ? res.body.toString() : res.text).toBe('png-bytes');
  });
});
