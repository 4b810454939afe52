import type { Account, AccountSummary } from "../types/account";
import { ValidationError } from "../utils/errors";

const EMAIL_REGEX = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const NAME_MIN_LENGTH = 2;
const NAME_MAX_LENGTH = 100;

// Token fields are written only through the helpers below, which keep each
// token and its expiry set or cleared together.

export function withVerificationToken(account: Account, token: string, expiresAt: Date): Account {
  return { ...account, verificationToken: token, verificationTokenExpiry: expiresAt };
}

export function clearVerificationToken(account: Account): Account {
  return { ...account, verificationToken: null, verificationTokenExpiry: null };
}

export function withResetToken(account: Account, token: string, expiresAt: Date): Account {
  return { ...account, resetToken: token, resetTokenExpiry: expiresAt };
}

export function clearResetToken(account: Account): Account {
  return { ...account, resetToken: null, resetTokenExpiry: null };
}

export function expiryFrom(now: Date, seconds: number): Date {
  return new Date(now.getTime() + seconds * 1000);
}

export function toAccountSummary(account: Account): AccountSummary {
  return {
    id: account.id,
    email: account.email,
    name: account.name,
    isVerified: account.isVerified,
    isActive: account.isActive,
    isAdmin: account.isAdmin,
    createdAt: account.createdAt,
    lastLoginAt: account.lastLoginAt,
  };
}

/** Emails are stored and looked up trimmed and lower-cased. */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export function requireField(value: string | undefined, field: string): string {
  if (typeof value !== "string" || !value.trim()) {
    throw new ValidationError(`${field} is required`);
  }
  return value;
}

export function requireEmail(email: string | undefined): string {
  const normalized = normalizeEmail(requireField(email, "Email"));
  if (!EMAIL_REGEX.test(normalized)) {
    throw new ValidationError("Invalid email format");
  }
  return normalized;
}

export function requireName(name: string | undefined): string {
  const trimmed = requireField(name, "Name").trim();
  if (trimmed.length < NAME_MIN_LENGTH) {
    throw new ValidationError(`Name must be at least ${NAME_MIN_LENGTH} characters long`);
  }
  if (trimmed.length > NAME_MAX_LENGTH) {
    throw new ValidationError(`Name must not exceed ${NAME_MAX_LENGTH} characters`);
  }
  return trimmed;
}
