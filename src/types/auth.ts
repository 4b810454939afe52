import type { AccountSummary } from "./account";

export interface MessageResult {
  message: string;
  success: true;
  /** Set when signup created a new record rather than refreshing a pending one. */
  created?: boolean;
}

export interface AuthResult {
  message: string;
  user: AccountSummary;
  accessToken: string;
  /** Returned by signin and email verification; refresh does not rotate it. */
  refreshToken?: string;
  tokenType: "bearer";
  expiresIn: number;
}

export interface VerifyResult extends AuthResult {
  isVerified: true;
}

export interface SignupInput {
  email: string;
  name: string;
  password: string;
}
