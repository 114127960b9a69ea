import request from 'supertest';
import { afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import { createApp } from '../app';
import { hashPassword, verifyAccessToken } from '../lib/auth';

let passwordHash = '';

beforeAll(async () => {
  passwordHash = await hashPassword('test-password');
});

afterEach(() => {
  vi.unstubAllEnvs();
});

function configureAdmin() {
  vi.stubEnv('ADMIN_USERNAME', 'admin');
  vi.stubEnv('ADMIN_PASSWORD_HASH', passwordHash);
}

describe('POST /api/auth/login', () => {
  it('issues a bearer token for the configured operator', async () => {
    configureAdmin();

    const res = await request(createApp())
      .post('/api/auth/login')
      .send({ username: 'admin', password: 'test-password' });

    expect(res.status).toBe(200);
    expect(res.body.success).toBe(true);
    expect(res.body.token_type).toBe('Bearer');
    expect(verifyAccessToken(res.body.access_token)).toMatchObject({ sub: 'admin', role: 'admin' });
  });

  it('rejects a wrong password', async () => {
    configureAdmin();

    const res = await request(createApp())
      .post('/api/auth/login')
      .send({ username: 'admin', password: 'wrong-password' });

    expect(res.status).toBe(401);
    expect(res.body).toEqual({ success: false, error: 'Invalid credentials.' });
  });

  it('answers 503 while no operator is configured', async () => {
    vi.stubEnv('ADMIN_USERNAME', '');

    const res = await request(createApp())
      .post('/api/auth/login')
      .send({ username: 'admin', password: 'test-password' });

    expect(res.status).toBe(503);
  });

  it('rejects an invalid token on protected routes', async () => {
    const res = await request(createApp()).get('/api/stores').set('Authorization', 'Bearer not-a-token');

    expect(res.status).toBe(401);
    expect(res.body).toEqual({ success: false, error: 'Invalid or expired access token.' });
  });
});
