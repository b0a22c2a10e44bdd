import request from 'supertest';
import { describe, it, expect } from 'vitest';
import app from '../../src/app';
import { pool } from '../../src/connections/db/connection';
import { PhoneVerification, User } from '../../src/connections/db/models';
import { cacheStore } from '../../src/utils/cache';
import { createUser, TEST_PASSWORD } from '../utils/test-helpers';

const signupForm = {
  first_name: 'Aziza',
  last_name: 'Karimova',
  gender: 'female',
  email: 'Aziza@Example.com',
  phone_number: '+998901112233',
  password: 'strong-pass-1',
  password_confirm: 'strong-pass-1',
  birth_date: '1995-03-10',
  address: 'Chilanzar 5',
  working_place: 'School 12',
  pinfl: '30101950123456',
  passport_number: 'ab1234567',
};

const findVerification = async (id: number): Promise<PhoneVerification> => {
  const result = await pool.query<PhoneVerification>('SELECT * FROM phone_verifications WHERE id = $1', [id]);
  return result.rows[0];
};

const otherCode = (code: string) => (code === '111111' ? '222222' : '111111');

const startSignup = async (): Promise<number> => {
  const res = await request(app).post('/api/auth/signup/step1').send(signupForm);
  expect(res.status).toBe(200);
  return res.body.data.verification_id;
};

describe('Signup', () => {
  it('caches the form under the verification id and returns the code metadata', async () => {
    const res = await request(app).post('/api/auth/signup/step1').send(signupForm);

    expect(res.status).toBe(200);
    expect(res.body.success).toBe(true);
    expect(res.body.data.phone_number).toBe('+998901112233');

    const session = await cacheStore.get(`signup_data_${res.body.data.verification_id}`);
    expect(session).toMatchObject({
      email: 'aziza@example.com',
      passport_number: 'AB1234567',
      working_place: 'School 12',
    });
    expect(session).not.toHaveProperty('password_confirm');
    expect(session).not.toHaveProperty('password');

    const verification = await findVerification(res.body.data.verification_id);
    expect(verification.code).toMatch(/^\d{6}$/);
    expect(verification.is_used).toBe(false);
    expect(verification.verification_type).toBe('signup');
  });

  it('rejects mismatched passwords per field', async () => {
    const res = await request(app)
      .post('/api/auth/signup/step1')
      .send({ ...signupForm, password_confirm: 'something-else' });

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('VALIDATION_ERROR');
    expect(res.body.error.details.password_confirm).toEqual(['Passwords do not match']);
  });

  it('rejects an email that is already registered', async () => {
    await createUser({ email: 'aziza@example.com' });

    const res = await request(app).post('/api/auth/signup/step1').send(signupForm);

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('USER_EXISTS');
    expect(res.body.error.details).toEqual({ email: ['User with this email already exists.'] });
  });

  it('retires the previous unused code when the same phone starts again', async () => {
    const first = await startSignup();
    const second = await startSignup();

    expect(second).not.toBe(first);
    expect((await findVerification(first)).is_used).toBe(true);
    expect((await findVerification(second)).is_used).toBe(false);
  });

  it('creates the user from the cached form once the code matches', async () => {
    const verificationId = await startSignup();
    const { code } = await findVerification(verificationId);

    const res = await request(app)
      .post('/api/auth/signup/step2')
      .send({ verification_id: verificationId, code });

    expect(res.status).toBe(201);
    expect(res.body.data.access).toEqual(expect.any(String));
    expect(res.body.data.refresh).toEqual(expect.any(String));
    expect(res.body.data.user).toMatchObject({
      email: 'aziza@example.com',
      full_name: 'Aziza Karimova',
      birth_date: '1995-03-10',
      is_staff: false,
    });
    expect(res.body.data.user).not.toHaveProperty('password_hash');

    const verification = await findVerification(verificationId);
    expect(verification.is_used).toBe(true);
    expect(verification.user_id).toBe(res.body.data.user.id);
    expect(await cacheStore.get(`signup_data_${verificationId}`)).toBeNull();
  });

  it('accepts a verification code only once', async () => {
    const verificationId = await startSignup();
    const { code } = await findVerification(verificationId);
    await request(app)
      .post('/api/auth/signup/step2')
      .send({ verification_id: verificationId, code })
      .expect(201);

    const replay = await request(app)
      .post('/api/auth/signup/step2')
      .send({ verification_id: verificationId, code });

    expect(replay.status).toBe(400);
    expect(replay.body.error.code).toBe('INVALID_CODE');
    const users = await pool.query('SELECT id FROM users');
    expect(users.rows).toHaveLength(1);
  });

  it('leaves everything untouched on a wrong code', async () => {
    const verificationId = await startSignup();
    const { code } = await findVerification(verificationId);

    const res = await request(app)
      .post('/api/auth/signup/step2')
      .send({ verification_id: verificationId, code: otherCode(code) });

    expect(res.status).toBe(400);
    expect(res.body.message).toBe('Invalid or expired verification code');
    expect((await findVerification(verificationId)).is_used).toBe(false);
    const users = await pool.query('SELECT id FROM users');
    expect(users.rows).toHaveLength(0);
  });

  it('refuses an expired code', async () => {
    const verificationId = await startSignup();
    const { code } = await findVerification(verificationId);
    await pool.query('UPDATE phone_verifications SET expires_at = $1 WHERE id = $2', [
      new Date(Date.now() - 1000),
      verificationId,
    ]);

    const res = await request(app)
      .post('/api/auth/signup/step2')
      .send({ verification_id: verificationId, code });

    expect(res.status).toBe(400);
    expect(res.body.message).toBe('Verification code has expired');
  });

  it('reports an expired session when the cached form is gone', async () => {
    const verificationId = await startSignup();
    const { code } = await findVerification(verificationId);
    await cacheStore.delete(`signup_data_${verificationId}`);

    const res = await request(app)
      .post('/api/auth/signup/step2')
      .send({ verification_id: verificationId, code });

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('SESSION_EXPIRED');
  });

  it('moves the cached form to a new code on resend', async () => {
    const verificationId = await startSignup();

    const res = await request(app)
      .post('/api/auth/signup/resend-sms')
      .send({ verification_id: verificationId });

    expect(res.status).toBe(200);
    const newId: number = res.body.data.verification_id;
    expect(newId).not.toBe(verificationId);
    expect(await cacheStore.get(`signup_data_${verificationId}`)).toBeNull();
    expect(await cacheStore.get(`signup_data_${newId}`)).toMatchObject({ email: 'aziza@example.com' });
    expect((await findVerification(verificationId)).is_used).toBe(true);
  });

  it('refuses to resend from a retired verification id', async () => {
    const first = await startSignup();
    const second = await startSignup();

    const res = await request(app)
      .post('/api/auth/signup/resend-sms')
      .send({ verification_id: first });

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('SESSION_EXPIRED');
    expect((await findVerification(second)).is_used).toBe(false);
    expect(await cacheStore.get(`signup_data_${second}`)).toMatchObject({ email: 'aziza@example.com' });
  });

  it('cannot resend without a cached form', async () => {
    const res = await request(app).post('/api/auth/signup/resend-sms').send({ verification_id: 9999 });

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('SESSION_EXPIRED');
  });
});

describe('Signin and tokens', () => {
  it('returns a token pair and the user', async () => {
    const user = await createUser();

    const res = await request(app)
      .post('/api/auth/signin')
      .send({ phone_number: user.phone_number, password: TEST_PASSWORD });

    expect(res.status).toBe(200);
    expect(res.body.data.user.id).toBe(user.id);
    expect(res.body.data.access).toEqual(expect.any(String));
  });

  it('rejects a wrong password', async () => {
    const user = await createUser();

    const res = await request(app)
      .post('/api/auth/signin')
      .send({ phone_number: user.phone_number, password: 'wrong-password' });

    expect(res.status).toBe(401);
    expect(res.body.message).toBe('No active account found with the given credentials');
  });

  it('rejects an inactive account', async () => {
    const user = await createUser({ is_active: false });

    const res = await request(app)
      .post('/api/auth/signin')
      .send({ phone_number: user.phone_number, password: TEST_PASSWORD });

    expect(res.status).toBe(401);
    expect(res.body.message).toBe('Account is inactive');
  });

  it('exchanges a refresh token but not an access token', async () => {
    const user = await createUser();
    const signin = await request(app)
      .post('/api/auth/signin')
      .send({ phone_number: user.phone_number, password: TEST_PASSWORD });

    const refreshed = await request(app)
      .post('/api/auth/token/refresh')
      .send({ refresh: signin.body.data.refresh });
    expect(refreshed.status).toBe(200);
    expect(refreshed.body.data.access).toEqual(expect.any(String));

    const misuse = await request(app)
      .post('/api/auth/token/refresh')
      .send({ refresh: signin.body.data.access });
    expect(misuse.status).toBe(401);
    expect(misuse.body.message).toBe('Token is not a valid refresh token');
  });
});

describe('Password reset', () => {
  const latestResetCode = async (phone: string): Promise<{ id: number; code: string }> => {
    const result = await pool.query<{ id: number; code: string }>(
      'SELECT id, code FROM password_reset_codes WHERE phone_number = $1 ORDER BY id DESC LIMIT 1',
      [phone]
    );
    return result.rows[0];
  };

  it('requires a registered phone number', async () => {
    const res = await request(app).post('/api/auth/send-reset-code').send({ phone_number: '+998907776655' });

    expect(res.status).toBe(400);
    expect(res.body.error.details).toEqual({ phone_number: ['User with this phone number does not exist.'] });
  });

  it('changes the password and consumes the code', async () => {
    const user = await createUser();
    await request(app).post('/api/auth/send-reset-code').send({ phone_number: user.phone_number }).expect(200);
    const { id, code } = await latestResetCode(user.phone_number);

    const res = await request(app)
      .post('/api/auth/reset-password')
      .send({ phone_number: user.phone_number, code, new_password: 'brand-new-pass' });

    expect(res.status).toBe(200);
    const remaining = await pool.query('SELECT id FROM password_reset_codes WHERE id = $1', [id]);
    expect(remaining.rows).toHaveLength(0);

    const stored = await pool.query<User>('SELECT * FROM users WHERE id = $1', [user.id]);
    expect(stored.rows[0].password_hash).not.toBe(user.password_hash);

    const signin = await request(app)
      .post('/api/auth/signin')
      .send({ phone_number: user.phone_number, password: 'brand-new-pass' });
    expect(signin.status).toBe(200);
  });

  it('rejects an unknown code', async () => {
    const user = await createUser();
    await request(app).post('/api/auth/send-reset-code').send({ phone_number: user.phone_number }).expect(200);
    const { code } = await latestResetCode(user.phone_number);

    const res = await request(app)
      .post('/api/auth/reset-password')
      .send({ phone_number: user.phone_number, code: otherCode(code), new_password: 'brand-new-pass' });

    expect(res.status).toBe(400);
    expect(res.body.error.details).toEqual({ code: ['Invalid code'] });
  });

  it('rejects a code older than five minutes', async () => {
    const user = await createUser();
    await request(app).post('/api/auth/send-reset-code').send({ phone_number: user.phone_number }).expect(200);
    const { id, code } = await latestResetCode(user.phone_number);
    await pool.query('UPDATE password_reset_codes SET created_at = $1 WHERE id = $2', [
      new Date(Date.now() - 6 * 60 * 1000),
      id,
    ]);

    const res = await request(app)
      .post('/api/auth/reset-password')
      .send({ phone_number: user.phone_number, code, new_password: 'brand-new-pass' });

    expect(res.status).toBe(400);
    expect(res.body.error.details).toEqual({ code: ['The code is expired'] });
  });
});
