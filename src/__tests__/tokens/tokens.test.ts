import * as jwt from 'jsonwebtoken';
import { createToken } from '../../tokens/createToken';
import { TokenIssuer } from '../../tokens/tokenIssuer';
import { parseClaims, verifyToken } from '../../tokens/verifyToken';
import type { JwtConfig } from '../../types/config';
import { DEFAULT_TOKEN_TTL } from '../../config';
import { START, TEST_SECRET, TestClock } from '../helpers';

const jwtConfig: JwtConfig = { secret: TEST_SECRET, algorithm: 'HS256' };

describe('Tokens', () => {
  let clock: TestClock;
  let issuer: TokenIssuer;

  beforeEach(() => {
    clock = new TestClock();
    issuer = new TokenIssuer({ jwt: jwtConfig, ttl: DEFAULT_TOKEN_TTL, now: clock.now });
  });

  describe('issuing', () => {
    it('writes purpose, identity and lifetime into access tokens', () => {
      const token = issuer.issueAccess('account-1', 'user@example.com', 'Test User');
      const claims = issuer.verify(token);
      const iat = Math.floor(START.getTime() / 1000);

      expect(claims).toMatchObject({
        type: 'access',
        sub: 'account-1',
        email: 'user@example.com',
        name: 'Test User',
        iat,
        exp: iat + 1800,
      });
      expect(typeof claims?.jti).toBe('string');
    });

    it('gives refresh tokens a week', () => {
      const claims = issuer.verify(issuer.issueRefresh('account-1', 'user@example.com', 'Test User'));
      expect(claims?.type).toBe('refresh');
      expect(claims && claims.exp - claims.iat).toBe(604800);
    });

    it('keeps email tokens to the address only', () => {
      const claims = issuer.verifyPurpose(issuer.issueEmailVerification('user@example.com'), 'email_verification');
      expect(claims).not.toBeNull();
      expect(claims && 'sub' in claims).toBe(false);
      expect(claims?.email).toBe('user@example.com');
      expect(claims && claims.exp - claims.iat).toBe(86400);
    });

    it('gives reset tokens an hour', () => {
      const claims = issuer.verifyPurpose(issuer.issuePasswordReset('user@example.com'), 'password_reset');
      expect(claims && claims.exp - claims.iat).toBe(3600);
    });

    it('never issues the same token twice', () => {
      const first = issuer.issueAccess('account-1', 'user@example.com', 'Test User');
      const second = issuer.issueAccess('account-1', 'user@example.com', 'Test User');
      expect(first).not.toBe(second);
    });

    it('reports lifetimes per purpose', () => {
      expect(issuer.accessTtlSeconds).toBe(1800);
      expect(issuer.ttlFor('refresh')).toBe(604800);
      expect(issuer.ttlFor('email_verification')).toBe(86400);
      expect(issuer.ttlFor('password_reset')).toBe(3600);
    });
  });

  describe('verification', () => {
    it('rejects a token used for another purpose', () => {
      const access = issuer.issueAccess('account-1', 'user@example.com', 'Test User');
      expect(issuer.verifyPurpose(access, 'refresh')).toBeNull();
      expect(issuer.verifyPurpose(access, 'access')?.sub).toBe('account-1');
    });

    it('narrows claims to the requested purpose', () => {
      const refresh = issuer.issueRefresh('account-7', 'user@example.com', 'Test User');
      const claims = issuer.verifyPurpose(refresh, 'refresh');
      const identity: { sub: string; name: string; type: 'refresh' } | null = claims;
      expect(identity?.sub).toBe('account-7');
      expect(identity?.name).toBe('Test User');

      const reset = issuer.verifyPurpose(issuer.issuePasswordReset('user@example.com'), 'password_reset');
      const address: { email: string; type: 'password_reset' } | null = reset;
      expect(address?.type).toBe('password_reset');
    });

    it('rejects expired tokens', () => {
      const token = issuer.issueAccess('account-1', 'user@example.com', 'Test User');
      clock.advance(1799);
      expect(issuer.verify(token)).not.toBeNull();
      clock.advance(1);
      expect(issuer.verify(token)).toBeNull();
    });

    it('rejects tampered tokens', () => {
      const token = issuer.issueAccess('account-1', 'user@example.com', 'Test User');
      const [header, , signature] = token.split('.');
      const forged = Buffer.from(
        JSON.stringify({ type: 'access', sub: 'account-2', email: 'x@example.com', name: 'X', iat: 1, exp: 9999999999 })
      ).toString('base64url');
      expect(issuer.verify(`${header}.${forged}.${signature}`)).toBeNull();
    });

    it('rejects tokens signed with another secret', () => {
      const other = new TokenIssuer({
        jwt: { secret: 'another-test-secret', algorithm: 'HS256' },
        ttl: DEFAULT_TOKEN_TTL,
        now: clock.now,
      });
      expect(issuer.verify(other.issueAccess('account-1', 'user@example.com', 'Test User'))).toBeNull();
    });

    it('pins the configured algorithm', () => {
      const now = clock.now();
      const token = createToken({ type: 'access', sub: 'a', email: 'e@example.com', name: 'n' }, { secret: TEST_SECRET, algorithm: 'HS512' }, 60, now);
      expect(verifyToken(token, jwtConfig, now)).toEqual({ valid: false, reason: 'invalid' });
    });

    it('tells expired apart from invalid for logging', () => {
      const now = clock.now();
      const token = createToken({ type: 'refresh', sub: 'a', email: 'e@example.com', name: 'n' }, jwtConfig, 60, now);
      expect(verifyToken(token, jwtConfig, new Date(now.getTime() + 61_000))).toEqual({ valid: false, reason: 'expired' });
      expect(verifyToken('garbage', jwtConfig, now)).toEqual({ valid: false, reason: 'invalid' });
    });

    it('flags foreign claim shapes as malformed', () => {
      const now = clock.now();
      const token = jwt.sign({ type: 'session', email: 'e@example.com', iat: Math.floor(now.getTime() / 1000) }, TEST_SECRET, {
        algorithm: 'HS256',
        expiresIn: 60,
      });
      expect(verifyToken(token, jwtConfig, now)).toEqual({ valid: false, reason: 'malformed' });
    });

    it('returns null for an empty token', () => {
      expect(issuer.verify('')).toBeNull();
    });
  });

  describe('parseClaims', () => {
    it('requires a subject on identity tokens', () => {
      expect(parseClaims({ type: 'access', email: 'e@example.com', name: 'n', iat: 1, exp: 2 })).toBeNull();
    });

    it('rejects string payloads', () => {
      expect(parseClaims('payload')).toBeNull();
    });

    it('narrows email tokens', () => {
      expect(parseClaims({ type: 'password_reset', email: 'e@example.com', iat: 1, exp: 2 })).toEqual({
        type: 'password_reset',
        email: 'e@example.com',
        iat: 1,
        exp: 2,
        jti: undefined,
      });
    });
  });
});
