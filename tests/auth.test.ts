import { describe, it, expect } from 'vitest';
import jwt from 'jsonwebtoken';
import { generateAccessToken, verifyAccessToken } from '../server/auth';

const issuedAt = 1_700_000_000_000;
const dayMs = 24 * 60 * 60 * 1000;

describe('Auth - Access tokens', () => {
  const token = generateAccessToken({ id: 5, orgId: 2, role: 'admin' }, 'test-secret', issuedAt);

  it('should accept a token it issued', () => {
    expect(verifyAccessToken(token, 'test-secret', issuedAt + 1000)).toEqual({
      valid: true,
      user: { id: 5, orgId: 2, role: 'admin' },
    });
  });

  it('should accept an HS256 token carrying the login service claims', () => {
    const now = Math.floor(issuedAt / 1000);
    const serviceToken = jwt.sign(
      { sub: 'admin@acme.test', org_id: 2, role: 'employee', user_id: 9, iat: now, exp: now + 1800, ext: 'padding' },
      'test-secret',
      { algorithm: 'HS256' },
    );

    expect(verifyAccessToken(serviceToken, 'test-secret', issuedAt)).toEqual({
      valid: true,
      user: { id: 9, orgId: 2, role: 'employee' },
    });
  });

  it('should reject a token signed with another secret', () => {
    expect(verifyAccessToken(token, 'other-secret', issuedAt)).toEqual({ valid: false, error: 'invalid_token' });
  });

  it('should reject a token with an altered payload', () => {
    const [header, , signature] = token.split('.');
    const forged = Buffer.from(
      JSON.stringify({ user_id: 5, org_id: 3, role: 'admin', iat: issuedAt / 1000, exp: issuedAt / 1000 + 86400 }),
    ).toString('base64url');

    expect(verifyAccessToken(`${header}.${forged}.${signature}`, 'test-secret', issuedAt)).toEqual({
      valid: false,
      error: 'invalid_token',
    });
  });

  it('should reject unsigned tokens', () => {
    const header = Buffer.from(JSON.stringify({ alg: 'none', typ: 'JWT' })).toString('base64url');
    const payload = Buffer.from(JSON.stringify({ user_id: 5, org_id: 2, role: 'admin' })).toString('base64url');

    expect(verifyAccessToken(`${header}.${payload}.`, 'test-secret', issuedAt)).toEqual({
      valid: false,
      error: 'invalid_token',
    });
  });

  it('should reject an expired token', () => {
    expect(verifyAccessToken(token, 'test-secret', issuedAt + dayMs + 1)).toEqual({ valid: false, error: 'expired' });
  });

  it('should reject a token without the organization claims', () => {
    const bare = jwt.sign({ sub: 'admin@acme.test', user_id: 5 }, 'test-secret', { algorithm: 'HS256' });

    expect(verifyAccessToken(bare, 'test-secret')).toEqual({ valid: false, error: 'invalid_claims' });
  });

  it('should reject malformed tokens', () => {
    expect(verifyAccessToken('not-a-token', 'test-secret', issuedAt)).toEqual({ valid: false, error: 'invalid_token' });
  });
});
