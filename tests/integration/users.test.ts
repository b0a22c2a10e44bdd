import request from 'supertest';
import { describe, it, expect, beforeEach } from 'vitest';
import app from '../../src/app';
import { pool } from '../../src/connections/db/connection';
import { User } from '../../src/connections/db/models';
import { authHeader, createStaff, createUser, TEST_PASSWORD } from '../utils/test-helpers';

describe('Users', () => {
  let user: User;
  let staff: User;

  beforeEach(async () => {
    user = await createUser({ first_name: 'Malika' });
    staff = await createStaff();
  });

  it('returns the caller on /me without the password hash', async () => {
    const res = await request(app).get('/api/users/me').set('Authorization', authHeader(user));

    expect(res.status).toBe(200);
    expect(res.body.data).toMatchObject({
      id: user.id,
      first_name: 'Malika',
      full_name: `Malika ${user.last_name}`,
      birth_date: '1990-05-17',
    });
    expect(res.body.data).not.toHaveProperty('password_hash');
  });

  it('rejects a missing or malformed token', async () => {
    const missing = await request(app).get('/api/users/me');
    expect(missing.status).toBe(401);
    expect(missing.body.message).toBe('Authentication credentials were not provided');

    const malformed = await request(app).get('/api/users/me').set('Authorization', 'Bearer not-a-token');
    expect(malformed.status).toBe(401);
  });

  it('keeps the user list to staff', async () => {
    const denied = await request(app).get('/api/users').set('Authorization', authHeader(user));
    expect(denied.status).toBe(403);

    const res = await request(app).get('/api/users?search=malika').set('Authorization', authHeader(staff));
    expect(res.status).toBe(200);
    expect(res.body.data.map((item: { id: number }) => item.id)).toEqual([user.id]);
  });

  it('hides other users from regular users but not from staff', async () => {
    const hidden = await request(app).get(`/api/users/${staff.id}`).set('Authorization', authHeader(user));
    expect(hidden.status).toBe(404);

    const visible = await request(app).get(`/api/users/${user.id}`).set('Authorization', authHeader(staff));
    expect(visible.status).toBe(200);
  });

  it('updates the profile and re-hashes a new password', async () => {
    const res = await request(app)
      .patch('/api/users/me')
      .set('Authorization', authHeader(user))
      .send({ address: 'Mirabad 7', password: 'another-pass-1' });

    expect(res.status).toBe(200);
    expect(res.body.data.address).toBe('Mirabad 7');

    const oldPassword = await request(app)
      .post('/api/auth/signin')
      .send({ phone_number: user.phone_number, password: TEST_PASSWORD });
    expect(oldPassword.status).toBe(401);

    const newPassword = await request(app)
      .post('/api/auth/signin')
      .send({ phone_number: user.phone_number, password: 'another-pass-1' });
    expect(newPassword.status).toBe(200);
  });

  it('does not let a regular user grant themselves staff rights', async () => {
    const res = await request(app)
      .patch('/api/users/me')
      .set('Authorization', authHeader(user))
      .send({ is_staff: true });

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('VALIDATION_ERROR');
  });

  it('lets staff deactivate a user', async () => {
    const res = await request(app)
      .patch(`/api/users/${user.id}`)
      .set('Authorization', authHeader(staff))
      .send({ is_active: false });

    expect(res.status).toBe(200);
    expect(res.body.data.is_active).toBe(false);

    const locked = await request(app).get('/api/users/me').set('Authorization', authHeader(user));
    expect(locked.status).toBe(401);
    expect(locked.body.message).toBe('Account is inactive');
  });

  it('rejects an email taken by someone else', async () => {
    const res = await request(app)
      .patch('/api/users/me')
      .set('Authorization', authHeader(user))
      .send({ email: staff.email });

    expect(res.status).toBe(400);
    expect(res.body.error.details).toEqual({ email: ['User with this email already exists.'] });
  });

  it('deletes the account', async () => {
    const res = await request(app).delete('/api/users/me').set('Authorization', authHeader(user));

    expect(res.status).toBe(200);
    const rows = await pool.query('SELECT id FROM users WHERE id = $1', [user.id]);
    expect(rows.rows).toHaveLength(0);
  });
});
