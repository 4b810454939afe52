import type { Account } from "./types/account";
import type { AuthResult, MessageResult, SignupInput, VerifyResult } from "./types/auth";
import type { ServiceConfig } from "./types/config";
import { createAuthContext, type AuthContext, type AuthContextDeps } from "./core/context";
import { signupCore } from "./core/signup";
import { signinCore } from "./core/signin";
import { resendVerificationCore, verifyEmailCore } from "./core/emailVerification";
import { requestPasswordResetCore, resetPasswordCore } from "./core/forgotPassword";
import { refreshTokenCore, resolveCurrentUser } from "./core/session";
import { RequestAuthenticator } from "./core/requestAuthenticator";

/**
 * Entry point for every account operation. One instance serves all requests;
 * the store holds the only mutable state.
 */
export class AuthService {
  readonly context: AuthContext;
  readonly authenticator: RequestAuthenticator;

  constructor(context: AuthContext) {
    this.context = context;
    this.authenticator = new RequestAuthenticator(context);
  }

  static create(config: ServiceConfig, deps: AuthContextDeps): AuthService {
    return new AuthService(createAuthContext(config, deps));
  }

  signup(input: SignupInput): Promise<MessageResult> {
    return signupCore(this.context, input);
  }

  signin(email: string, password: string): Promise<AuthResult> {
    return signinCore(this.context, email, password);
  }

  verifyEmail(token: string): Promise<VerifyResult> {
    return verifyEmailCore(this.context, token);
  }

  resendVerification(email: string): Promise<MessageResult> {
    return resendVerificationCore(this.context, email);
  }

  requestPasswordReset(email: string): Promise<MessageResult> {
    return requestPasswordResetCore(this.context, email);
  }

  resetPassword(token: string, newPassword: string): Promise<MessageResult> {
    return resetPasswordCore(this.context, token, newPassword);
  }

  refreshToken(refreshToken: string): Promise<AuthResult> {
    return refreshTokenCore(this.context, refreshToken);
  }

  resolveCurrentUser(accessToken: string): Promise<Account | null> {
    return resolveCurrentUser(this.context, accessToken);
  }

  authenticate(header: string | undefined | null): Promise<Account> {
    return this.authenticator.authenticate(header);
  }

  authenticateOptional(header: string | undefined | null): Promise<Account | null> {
    return this.authenticator.authenticateOptional(header);
  }
}
