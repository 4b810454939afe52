import type { JwtConfig, TokenTtlConfig } from "../types/config";
import { createLogger } from "../utils/logger";
import { createToken } from "./createToken";
import {
  verifyToken,
  type ClaimsFor,
  type TokenClaims,
  type TokenPurpose,
} from "./verifyToken";

const log = createLogger("tokens");

export interface TokenIssuerOptions {
  jwt: JwtConfig;
  ttl: TokenTtlConfig;
  now?: () => Date;
}

/**
 * Mints and validates purpose-scoped JWTs. Holds only configuration, so one
 * instance is shared by every request.
 */
export class TokenIssuer {
  private readonly jwt: JwtConfig;
  private readonly ttl: TokenTtlConfig;
  private readonly now: () => Date;

  constructor(options: TokenIssuerOptions) {
    this.jwt = options.jwt;
    this.ttl = options.ttl;
    this.now = options.now ?? (() => new Date());
  }

  get accessTtlSeconds(): number {
    return this.ttl.accessSeconds;
  }

  ttlFor(purpose: TokenPurpose): number {
    switch (purpose) {
      case "access":
        return this.ttl.accessSeconds;
      case "refresh":
        return this.ttl.refreshSeconds;
      case "email_verification":
        return this.ttl.emailVerificationSeconds;
      case "password_reset":
        return this.ttl.passwordResetSeconds;
    }
  }

  issueAccess(accountId: string, email: string, name: string): string {
    return createToken({ type: "access", sub: accountId, email, name }, this.jwt, this.ttl.accessSeconds, this.now());
  }

  issueRefresh(accountId: string, email: string, name: string): string {
    return createToken({ type: "refresh", sub: accountId, email, name }, this.jwt, this.ttl.refreshSeconds, this.now());
  }

  issueEmailVerification(email: string): string {
    return createToken({ type: "email_verification", email }, this.jwt, this.ttl.emailVerificationSeconds, this.now());
  }

  issuePasswordReset(email: string): string {
    return createToken({ type: "password_reset", email }, this.jwt, this.ttl.passwordResetSeconds, this.now());
  }

  /** Decoded claims, or null for any failure: expired and tampered look the same. */
  verify(token: string): TokenClaims | null {
    if (!token) return null;
    const outcome = verifyToken(token, this.jwt, this.now());
    if (!outcome.valid) {
      log.debug(`Token rejected (${outcome.reason})`);
      return null;
    }
    return outcome.claims;
  }

  verifyPurpose<P extends TokenPurpose>(token: string, purpose: P): ClaimsFor<P> | null {
    const claims = this.verify(token);
    if (!claims) return null;
    if (!hasPurpose(claims, purpose)) {
      log.debug(`Token rejected (purpose ${claims.type}, expected ${purpose})`);
      return null;
    }
    return claims;
  }
}

function hasPurpose<P extends TokenPurpose>(claims: TokenClaims, purpose: P): claims is ClaimsFor<P> {
  return claims.type === purpose;
}
