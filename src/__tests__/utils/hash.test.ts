import { CredentialHasher, checkPasswordStrength, generateSecureToken } from '../../utils/hash';

describe('Credential Hasher', () => {
  const hasher = new CredentialHasher({ rounds: 4 });

  // ============================= Password Strength =============================

  describe('checkPasswordStrength', () => {
    it('cites length for short passwords', () => {
      expect(checkPasswordStrength('weak')).toEqual({
        ok: false,
        reason: 'Password must be at least 8 characters long',
      });
    });

    it('cites the missing uppercase letter', () => {
      expect(checkPasswordStrength('alllowercase1')).toEqual({
        ok: false,
        reason: 'Password must contain at least one uppercase letter',
      });
    });

    it('cites the missing lowercase letter', () => {
      expect(checkPasswordStrength('ALLUPPERCASE1').reason).toBe(
        'Password must contain at least one lowercase letter'
      );
    });

    it('cites the missing digit', () => {
      expect(checkPasswordStrength('NoDigitsHere').reason).toBe('Password must contain at least one number');
    });

    it('rejects common patterns regardless of case', () => {
      expect(checkPasswordStrength('Xx123456yy').reason).toBe('Password contains common patterns');
      expect(checkPasswordStrength('QWERTYuiop9').reason).toBe('Password contains common patterns');
      expect(checkPasswordStrength('ZzAbc123zz').reason).toBe('Password contains common patterns');
    });

    it('allows the word password inside an otherwise strong password', () => {
      expect(checkPasswordStrength('MyPassword1')).toEqual({ ok: true, reason: 'Password is strong' });
    });

    it('caps passwords at the bcrypt input limit in bytes', () => {
      expect(checkPasswordStrength('Aa1' + 'x'.repeat(69)).ok).toBe(true);
      expect(checkPasswordStrength('Aa1' + 'x'.repeat(70)).reason).toBe('Password must not exceed 72 bytes');
      // 2 bytes per character
      expect(checkPasswordStrength('Aa1' + 'é'.repeat(35)).reason).toBe('Password must not exceed 72 bytes');
    });

    it('reports only the first violated rule', () => {
      expect(checkPasswordStrength('abc').reason).toBe('Password must be at least 8 characters long');
    });

    it('accepts a strong password', () => {
      expect(checkPasswordStrength('TestPassword123')).toEqual({ ok: true, reason: 'Password is strong' });
    });

    it('is exposed on the hasher', () => {
      expect(hasher.checkStrength('weak').ok).toBe(false);
    });
  });

  // ============================= Secure Tokens =============================

  describe('generateSecureToken', () => {
    it('defaults to 32 alphanumeric characters', () => {
      expect(generateSecureToken()).toMatch(/^[A-Za-z0-9]{32}$/);
    });

    it('honours the requested length', () => {
      expect(hasher.generateSecureToken(8)).toHaveLength(8);
    });

    it('does not repeat', () => {
      const tokens = new Set(Array.from({ length: 50 }, () => generateSecureToken()));
      expect(tokens.size).toBe(50);
    });

    it('rejects non-positive lengths', () => {
      expect(() => generateSecureToken(0)).toThrow(RangeError);
      expect(() => generateSecureToken(1.5)).toThrow(RangeError);
    });
  });

  // ============================= Hashing =============================

  describe('hash and verify', () => {
    it('salts every hash yet both verify', async () => {
      const first = await hasher.hash('TestPassword123');
      const second = await hasher.hash('TestPassword123');

      expect(first).not.toBe(second);
      await expect(hasher.verify('TestPassword123', first)).resolves.toBe(true);
      await expect(hasher.verify('TestPassword123', second)).resolves.toBe(true);
    });

    it('rejects the wrong password', async () => {
      const hash = await hasher.hash('TestPassword123');
      await expect(hasher.verify('TestPassword124', hash)).resolves.toBe(false);
    });

    it('uses the configured cost', async () => {
      const hash = await hasher.hash('TestPassword123');
      expect(hash.startsWith('$2a$04$') || hash.startsWith('$2b$04$')).toBe(true);
    });

    it('returns false for a malformed hash instead of throwing', async () => {
      await expect(hasher.verify('TestPassword123', 'not-a-bcrypt-hash')).resolves.toBe(false);
    });

    it('dummyVerify completes without an account', async () => {
      await expect(hasher.dummyVerify('anything')).resolves.toBeUndefined();
    });

    it('never matches input longer than the bcrypt limit', async () => {
      const stored = 'Aa1' + 'x'.repeat(69);
      const hash = await hasher.hash(stored);
      await expect(hasher.verify(stored, hash)).resolves.toBe(true);
      await expect(hasher.verify(stored + 'something-else', hash)).resolves.toBe(false);
    });

    it('rejects out of range cost factors', () => {
      expect(() => new CredentialHasher({ rounds: 3 })).toThrow(RangeError);
      expect(() => new CredentialHasher({ rounds: 16 })).toThrow(
        'bcrypt rounds must be an integer between 4 and 15'
      );
      expect(new CredentialHasher({ rounds: 15 }).rounds).toBe(15);
    });
  });
});
