import { ValidationError } from '../../utils/errors';
import { STRONG_PASSWORD, createHarness, createVerifiedAccount, type TestHarness } from '../helpers';

async function signupPending(harness: TestHarness): Promise<string> {
  await harness.auth.signup({ email: 'user@example.com', name: 'Test User', password: STRONG_PASSWORD });
  return harness.notifier.lastToken('verification');
}

describe('verifyEmail', () => {
  it('verifies the account and signs it in', async () => {
    const harness = createHarness();
    const token = await signupPending(harness);
    harness.clock.advance(120);

    const result = await harness.auth.verifyEmail(token);

    expect(result).toMatchObject({
      message: 'Email verified successfully. You are now signed in.',
      isVerified: true,
      tokenType: 'bearer',
      expiresIn: 1800,
      user: { id: 'account-1', isVerified: true, lastLoginAt: new Date('2024-01-01T00:02:00.000Z') },
    });
    expect(harness.auth.context.tokens.verifyPurpose(result.accessToken, 'access')?.sub).toBe('account-1');
    expect(typeof result.refreshToken).toBe('string');

    const stored = await harness.store.findById('account-1');
    expect(stored).toMatchObject({ isVerified: true, verificationToken: null, verificationTokenExpiry: null });
    expect(harness.notifier.last('welcome')).toEqual({ kind: 'welcome', email: 'user@example.com', name: 'Test User' });
  });

  it('accepts a token only once', async () => {
    const harness = createHarness();
    const token = await signupPending(harness);
    await harness.auth.verifyEmail(token);

    await expect(harness.auth.verifyEmail(token)).rejects.toThrow(
      new ValidationError('Invalid or expired verification token')
    );
    const stored = await harness.store.findById('account-1');
    expect(stored?.isVerified).toBe(true);
  });

  it('treats an expired token like an unknown one', async () => {
    const harness = createHarness();
    const token = await signupPending(harness);
    harness.clock.advance(24 * 60 * 60);

    await expect(harness.auth.verifyEmail(token)).rejects.toThrow(
      new ValidationError('Invalid or expired verification token')
    );
    await expect(harness.auth.verifyEmail('A'.repeat(32))).rejects.toThrow(
      new ValidationError('Invalid or expired verification token')
    );
    expect((await harness.store.findById('account-1'))?.isVerified).toBe(false);
  });

  it('still verifies when the welcome email fails', async () => {
    const harness = createHarness();
    const token = await signupPending(harness);
    harness.notifier.mode = 'throw';

    await expect(harness.auth.verifyEmail(token)).resolves.toMatchObject({ isVerified: true });
    expect((await harness.store.findById('account-1'))?.isVerified).toBe(true);
  });

  it('requires a token', async () => {
    const { auth } = createHarness();
    await expect(auth.verifyEmail('')).rejects.toThrow(new ValidationError('Token is required'));
  });
});

describe('resendVerification', () => {
  it('issues a fresh token and retires the old one', async () => {
    const harness = createHarness();
    const first = await signupPending(harness);
    harness.clock.advance(23 * 60 * 60);

    const result = await harness.auth.resendVerification('USER@example.com');

    expect(result).toEqual({ message: 'Verification email sent successfully', success: true });
    const second = harness.notifier.lastToken('verification');
    expect(second).not.toBe(first);

    harness.clock.advance(2 * 60 * 60);
    await expect(harness.auth.verifyEmail(first)).rejects.toThrow('Invalid or expired verification token');
    await expect(harness.auth.verifyEmail(second)).resolves.toMatchObject({ isVerified: true });
  });

  it('rejects unknown emails', async () => {
    const { auth } = createHarness();
    await expect(auth.resendVerification('nobody@example.com')).rejects.toThrow(new ValidationError('User not found'));
  });

  it('rejects verified accounts', async () => {
    const harness = createHarness();
    await createVerifiedAccount(harness);

    await expect(harness.auth.resendVerification('user@example.com')).rejects.toThrow(
      new ValidationError('Email already verified')
    );
  });

  it.each(['fail', 'throw'] as const)('surfaces a failed send (%s)', async (mode) => {
    const harness = createHarness();
    await signupPending(harness);
    harness.notifier.mode = mode;

    await expect(harness.auth.resendVerification('user@example.com')).rejects.toThrow(
      new ValidationError('Failed to send verification email')
    );
  });
});
