// Public surface of the account service.

// --- Configuration ---
export { loadConfig, ConfigError, DEFAULT_TOKEN_TTL } from "./config/index";
export type { ServiceConfig, JwtConfig, TokenTtlConfig, EmailConfig, SmtpConfig, StoreConfig } from "./types/config";

// --- Service ---
export { AuthService } from "./auth";
export { createAuthContext, type AuthContext, type AuthContextDeps } from "./core/context";
export {
  RequestAuthenticator,
  parseAuthorizationHeader,
  requireAdmin as assertAdmin,
  type Credential,
} from "./core/requestAuthenticator";

// --- HTTP ---
export { createApp, createAuthRouter, AUTH_BASE_PATH } from "./frameworks/express";
export { authMiddleware, optionalAuthMiddleware, requireAdmin, type AuthenticatedRequest } from "./middleware/authMiddleware";
export { asyncHandler } from "./middleware/asyncHandler";

// --- Stores & notifiers ---
export { MemoryAccountStore, MongoAccountStore, connectMongoStore } from "./adapters";
export { createNotifier, ConsoleNotifier, SMTPNotifier } from "./email";

// --- Security utilities ---
export { CredentialHasher, checkPasswordStrength, generateSecureToken } from "./utils/hash";
export { TokenIssuer } from "./tokens/tokenIssuer";

// --- Errors & logging ---
export * from "./utils/errors";
export { errorHandler, toErrorResponse } from "./utils/response";
export { logger, createLogger, reconfigureLogger } from "./utils/logger";

// --- Types ---
export type { Account, AccountSummary } from "./types/account";
export type { AccountStore } from "./types/db";
export type { Notifier } from "./types/email";
export type { AuthResult, MessageResult, VerifyResult, SignupInput } from "./types/auth";
export type { TokenClaims, TokenPurpose } from "./tokens/verifyToken";
