import type { Account } from "../types/account";
import type { MessageResult, SignupInput } from "../types/auth";
import { ConflictError, ValidationError } from "../utils/errors";
import { clearResetToken, expiryFrom, requireEmail, requireField, requireName, withVerificationToken } from "./account";
import { deliver, type AuthContext } from "./context";

export const SIGNUP_MESSAGES = {
  created: "User registered successfully. Please check your email for verification.",
  resent: "Verification email sent. Please check your email for verification.",
  alreadyRegistered: "Email already registered",
} as const;

const VERIFICATION_TOKEN_LENGTH = 32;

/**
 * Register an account, or refresh a pending one.
 *
 * An unverified record for the same email is treated as an abandoned signup:
 * it gets the new password, name and a fresh verification token instead of a
 * duplicate-email error. Only a verified email is reported as taken.
 */
export async function signupCore(ctx: AuthContext, input: SignupInput): Promise<MessageResult> {
  const email = requireEmail(input.email);
  const name = requireName(input.name);
  const password = requireField(input.password, "Password");

  try {
    return await registerOrRefresh(ctx, email, name, password);
  } catch (error) {
    if (!(error instanceof ConflictError)) throw error;
    // A concurrent signup inserted the same email first; settle against its record.
    ctx.logger.event({ category: "auth", action: "signup", outcome: "insert-conflict", email });
    return registerOrRefresh(ctx, email, name, password);
  }
}

async function registerOrRefresh(
  ctx: AuthContext,
  email: string,
  name: string,
  password: string
): Promise<MessageResult> {
  const existing = await ctx.store.findByEmail(email);

  if (existing?.isVerified) {
    throw new ValidationError(SIGNUP_MESSAGES.alreadyRegistered);
  }

  const strength = ctx.hasher.checkStrength(password);
  if (!strength.ok) {
    throw new ValidationError(strength.reason);
  }

  const passwordHash = await ctx.hasher.hash(password);
  const now = ctx.now();
  const token = ctx.hasher.generateSecureToken(VERIFICATION_TOKEN_LENGTH);
  const expiresAt = expiryFrom(now, ctx.ttl.emailVerificationSeconds);

  if (existing) {
    const refreshed = withVerificationToken({ ...existing, name, passwordHash }, token, expiresAt);
    const saved = await ctx.store.update(refreshed);
    await sendVerificationBestEffort(ctx, saved, token);
    ctx.logger.event({ category: "auth", action: "signup", outcome: "success", accountId: saved.id, pending: true });
    return { message: SIGNUP_MESSAGES.resent, success: true, created: false };
  }

  const account: Account = clearResetToken(
    withVerificationToken(
      {
        id: ctx.newId(),
        email,
        name,
        passwordHash,
        isVerified: false,
        isActive: true,
        isAdmin: false,
        verificationToken: null,
        verificationTokenExpiry: null,
        resetToken: null,
        resetTokenExpiry: null,
        createdAt: now,
        updatedAt: now,
        lastLoginAt: null,
      },
      token,
      expiresAt
    )
  );

  const saved = await ctx.store.insert(account);
  await sendVerificationBestEffort(ctx, saved, token);
  ctx.logger.event({ category: "auth", action: "signup", outcome: "success", accountId: saved.id, pending: false });
  return { message: SIGNUP_MESSAGES.created, success: true, created: true };
}

async function sendVerificationBestEffort(ctx: AuthContext, account: Account, token: string): Promise<void> {
  const sent = await deliver(ctx, "verification", account.email, () =>
    ctx.notifier.sendVerification(account.email, account.name, token)
  );
  if (!sent) {
    // The account is already saved; the user can ask for another email.
    ctx.logger.warn(`Verification email to ${account.email} was not delivered; signup continues`);
  }
}
