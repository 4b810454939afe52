import type { Account } from "../types/account";
import { AuthenticationError, AuthorizationError, ValidationError } from "../utils/errors";
import { normalizeEmail } from "./account";
import type { AuthContext } from "./context";
import { resolveCurrentUser } from "./session";
import { verifyCredentials } from "./signin";

export type Credential =
  | { scheme: "bearer"; token: string }
  | { scheme: "basic"; email: string; password: string };

export const REQUEST_AUTH_MESSAGES = {
  required: "Authentication required",
  invalid: "Invalid authentication credentials",
  disabled: "User account is disabled",
  unverified: "Email not verified",
  adminRequired: "Admin privileges required",
} as const;

const BASE64_REGEX = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * Read an Authorization header value. Returns null for anything that is not a
 * well formed Bearer or Basic credential.
 */
export function parseAuthorizationHeader(header: string | undefined | null): Credential | null {
  if (!header) return null;

  const trimmed = header.trim();
  const space = trimmed.indexOf(" ");
  if (space <= 0) return null;

  const scheme = trimmed.slice(0, space).toLowerCase();
  const value = trimmed.slice(space + 1).trim();
  if (!value) return null;

  if (scheme === "bearer") {
    return { scheme: "bearer", token: value };
  }

  if (scheme === "basic") {
    if (value.length % 4 !== 0 || !BASE64_REGEX.test(value)) return null;
    const decoded = Buffer.from(value, "base64").toString("utf8");
    const colon = decoded.indexOf(":");
    if (colon < 0) return null;
    const email = normalizeEmail(decoded.slice(0, colon));
    const password = decoded.slice(colon + 1);
    if (!email || !password) return null;
    return { scheme: "basic", email, password };
  }

  return null;
}

export function requireAdmin(account: Account): Account {
  if (!account.isAdmin) {
    throw new AuthorizationError(REQUEST_AUTH_MESSAGES.adminRequired);
  }
  return account;
}

/** Resolves the account behind an Authorization header. Holds no per-request state. */
export class RequestAuthenticator {
  constructor(private readonly ctx: AuthContext) {}

  async authenticate(header: string | undefined | null): Promise<Account> {
    const credential = parseAuthorizationHeader(header);
    if (!credential) {
      throw new AuthenticationError(REQUEST_AUTH_MESSAGES.required);
    }

    const account = await this.resolve(credential);

    if (!account.isActive) {
      throw new AuthenticationError(REQUEST_AUTH_MESSAGES.disabled);
    }
    if (!account.isVerified) {
      throw new AuthenticationError(REQUEST_AUTH_MESSAGES.unverified);
    }
    return account;
  }

  /** Like authenticate, but a missing or rejected credential yields null. */
  async authenticateOptional(header: string | undefined | null): Promise<Account | null> {
    if (!header) return null;
    try {
      return await this.authenticate(header);
    } catch (error) {
      if (error instanceof AuthenticationError) return null;
      throw error;
    }
  }

  private async resolve(credential: Credential): Promise<Account> {
    if (credential.scheme === "basic") {
      try {
        return await verifyCredentials(this.ctx, credential.email, credential.password);
      } catch (error) {
        // A malformed email in a Basic header is a bad credential, not bad input.
        if (error instanceof ValidationError) {
          throw new AuthenticationError(REQUEST_AUTH_MESSAGES.invalid);
        }
        throw error;
      }
    }

    const account = await resolveCurrentUser(this.ctx, credential.token);
    if (!account) {
      this.ctx.logger.event({ category: "auth", action: "authenticate", outcome: "invalid-token" });
      throw new AuthenticationError(REQUEST_AUTH_MESSAGES.invalid);
    }
    return account;
  }
}
