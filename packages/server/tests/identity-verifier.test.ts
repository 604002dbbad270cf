import { describe, it, expect } from 'vitest';
import jwt from 'jsonwebtoken';
import { IdentityVerifier, parseBearerHeader, signAccessToken } from '../src/auth';
import { TEST_SECRET, kindOfSync } from './helpers';

const NOW = new Date('2026-03-01T12:00:00.000Z');
const NOW_SECONDS = Math.floor(NOW.getTime() / 1000);

describe('IdentityVerifier', () => {
  const verifier = new IdentityVerifier({ secret: TEST_SECRET, now: () => NOW });

  it('extracts the identity from a valid token', () => {
    const token = signAccessToken(TEST_SECRET, { userId: 'user-1', email: 'one@example.test' }, { now: NOW, ttlSeconds: 3600 });

    expect(verifier.verify(token)).toEqual({
      userId: 'user-1',
      email: 'one@example.test',
      issuedAt: new Date('2026-03-01T12:00:00.000Z'),
      expiresAt: new Date('2026-03-01T13:00:00.000Z'),
    });
  });

  it('carries the display name when the token has one', () => {
    const token = signAccessToken(TEST_SECRET, { userId: 'user-1', email: 'one@example.test', name: 'One' }, { now: NOW });

    expect(verifier.verify(token)).toMatchObject({ userId: 'user-1', email: 'one@example.test', name: 'One' });
  });

  it('defaults the token lifetime to seven days', () => {
    const token = signAccessToken(TEST_SECRET, { userId: 'user-1' }, { now: NOW });

    expect(verifier.verify(token).expiresAt).toEqual(new Date('2026-03-08T12:00:00.000Z'));
  });

  it('reports expired tokens separately from invalid ones', () => {
    const twoHoursAgo = new Date(NOW.getTime() - 2 * 60 * 60 * 1000);
    const token = signAccessToken(TEST_SECRET, { userId: 'user-1' }, { now: twoHoursAgo, ttlSeconds: 3600 });

    expect(kindOfSync(() => verifier.verify(token))).toBe('CREDENTIAL_EXPIRED');
  });

  it('rejects tokens signed with another secret', () => {
    const token = signAccessToken('other-secret', { userId: 'user-1' }, { now: NOW });

    expect(kindOfSync(() => verifier.verify(token))).toBe('CREDENTIAL_INVALID');
  });

  it('rejects malformed tokens', () => {
    expect(kindOfSync(() => verifier.verify('not-a-token'))).toBe('CREDENTIAL_INVALID');
    expect(kindOfSync(() => verifier.verify(''))).toBe('CREDENTIAL_INVALID');
  });

  it('rejects tokens signed with a different algorithm', () => {
    const token = jwt.sign({ sub: 'user-1', exp: NOW_SECONDS + 60 }, TEST_SECRET, { algorithm: 'HS512' });

    expect(kindOfSync(() => verifier.verify(token))).toBe('CREDENTIAL_INVALID');
  });

  it('rejects tokens without an expiry', () => {
    const token = jwt.sign({ sub: 'user-1' }, TEST_SECRET, { algorithm: 'HS256' });

    expect(kindOfSync(() => verifier.verify(token))).toBe('CREDENTIAL_INVALID');
  });

  it('rejects tokens without a subject', () => {
    const token = jwt.sign({ sub: '  ', exp: NOW_SECONDS + 60 }, TEST_SECRET, { algorithm: 'HS256' });

    expect(kindOfSync(() => verifier.verify(token))).toBe('CREDENTIAL_INVALID');
  });

  it('never puts the secret into the error', () => {
    try {
      verifier.verify(signAccessToken('other-secret', { userId: 'user-1' }, { now: NOW }));
      expect.unreachable('expected verification to fail');
    } catch (err) {
      expect(err).toHaveProperty('message', 'CREDENTIAL_INVALID');
    }
  });

  it('requires a secret', () => {
    expect(() => new IdentityVerifier({ secret: '' })).toThrow('IdentityVerifier requires a secret');
  });
});

describe('parseBearerHeader', () => {
  it('extracts the token', () => {
    expect(parseBearerHeader('Bearer abc.def.ghi')).toBe('abc.def.ghi');
    expect(parseBearerHeader('bearer abc.def.ghi')).toBe('abc.def.ghi');
    expect(parseBearerHeader('  Bearer   abc  ')).toBe('abc');
  });

  it('returns null for anything else', () => {
    expect(parseBearerHeader(undefined)).toBeNull();
    expect(parseBearerHeader('')).toBeNull();
    expect(parseBearerHeader('Bearer')).toBeNull();
    expect(parseBearerHeader('Basic dXNlcjpwYXNz')).toBeNull();
    expect(parseBearerHeader('Bearer two parts')).toBeNull();
  });
});
