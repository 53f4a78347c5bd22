import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { createTestApp, refreshCookieOf } from './testApp.js';

describe('E2E: credential lifecycle', () => {
  it('should register, rotate, read the profile and log out', async () => {
    const { app } = createTestApp();
    const email = 'lifecycle@example.com';

    // 1. Register
    const registerRes = await request(app).post('/api/auth/register').send({ email, password: 'Passw0rd' });
    expect(registerRes.status).toBe(201);
    const userId: string = registerRes.body.user.id;
    const firstRefresh = refreshCookieOf(registerRes) ?? '';

    // 2. Login from another device
    const loginRes = await request(app).post('/api/auth/login').send({ email, password: 'Passw0rd' });
    expect(loginRes.status).toBe(200);
    expect(loginRes.body.user.id).toBe(userId);

    // 3. Rotate the first session
    const refreshRes = await request(app).post('/api/auth/refresh').set('Cookie', `refresh_token=${firstRefresh}`);
    expect(refreshRes.status).toBe(200);
    const rotatedRefresh = refreshCookieOf(refreshRes) ?? '';
    const accessToken: string = refreshRes.body.access_token;

    // 4. Profile shows the login
    const meRes = await request(app).get('/api/auth/me').set('Authorization', `Bearer ${accessToken}`);
    expect(meRes.status).toBe(200);
    expect(meRes.body.id).toBe(userId);
    expect(meRes.body.last_login_at).not.toBeNull();

    // 5. Logout revokes the rotated token only
    const logoutRes = await request(app)
      .post('/api/auth/logout')
      .set('Authorization', `Bearer ${accessToken}`)
      .set('Cookie', `refresh_token=${rotatedRefresh}`);
    expect(logoutRes.status).toBe(200);

    const afterLogout = await request(app).post('/api/auth/refresh').set('Cookie', `refresh_token=${rotatedRefresh}`);
    expect(afterLogout.status).toBe(401);

    // Access tokens are not revoked on logout; a repeat logout is a no-op
    const meAfterLogout = await request(app).get('/api/auth/me').set('Authorization', `Bearer ${accessToken}`);
    expect(meAfterLogout.status).toBe(200);
    const secondLogout = await request(app)
      .post('/api/auth/logout')
      .set('Authorization', `Bearer ${accessToken}`)
      .set('Cookie', `refresh_token=${rotatedRefresh}`);
    expect(secondLogout.status).toBe(200);

    const otherDevice = await request(app)
      .post('/api/auth/refresh')
      .set('Cookie', `refresh_token=${refreshCookieOf(loginRes) ?? ''}`);
    expect(otherDevice.status).toBe(200);

    // 6. The replaced first token stays dead
    const replay = await request(app).post('/api/auth/refresh').set('Cookie', `refresh_token=${firstRefresh}`);
    expect(replay.status).toBe(401);
  });
});
