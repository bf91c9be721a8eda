import { afterEach, describe, expect, it, vi } from 'vitest';
import { signAccessToken, verifyAccessToken } from './auth';

const payload = { sub: 'user-1', tenantId: 'tenant-a', role: 'planner' };

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('access tokens', () => {
  it('round-trips the caller identity', () => {
    const token = signAccessToken(payload, 'test-secret');
    expect(verifyAccessToken(token, 'test-secret')).toEqual(payload);
  });

  it('rejects a token signed with another secret', () => {
    const token = signAccessToken(payload, 'test-secret');
    expect(() => verifyAccessToken(token, 'other-secret')).toThrow('invalid signature');
  });

  it('reads the secret from the environment', () => {
    vi.stubEnv('JWT_SECRET', 'test-secret');
    expect(verifyAccessToken(signAccessToken(payload))).toEqual(payload);
  });

  it('refuses to sign without a configured secret', () => {
    vi.stubEnv('JWT_SECRET', '');
    expect(() => signAccessToken(payload)).toThrow('JWT_SECRET must be set before starting the API');
  });
});
