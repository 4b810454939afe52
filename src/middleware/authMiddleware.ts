import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { AuthService } from "../auth";
import { requireAdmin as assertAdmin } from "../core/requestAuthenticator";
import type { Account } from "../types/account";
import { AuthenticationError } from "../utils/errors";
import { asyncHandler } from "./asyncHandler";

declare global {
  namespace Express {
    interface Request {
      /** Set by authMiddleware, and by optionalAuthMiddleware when a credential checks out. */
      account?: Account;
    }
  }
}

export interface AuthenticatedRequest extends Request {
  account: Account;
}

export function isAuthenticated(req: Request): req is AuthenticatedRequest {
  return req.account !== undefined;
}

/** Reject the request unless the Authorization header resolves to an active, verified account. */
export function authMiddleware(auth: AuthService): RequestHandler {
  return asyncHandler(async (req, _res, next) => {
    req.account = await auth.authenticate(req.headers.authorization);
    next();
  });
}

export function optionalAuthMiddleware(auth: AuthService): RequestHandler {
  return asyncHandler(async (req, _res, next) => {
    const account = await auth.authenticateOptional(req.headers.authorization);
    if (account) {
      req.account = account;
    }
    next();
  });
}

/** Must run after authMiddleware. */
export function requireAdmin(req: Request, _res: Response, next: NextFunction): void {
  if (!req.account) {
    throw new AuthenticationError();
  }
  assertAdmin(req.account);
  next();
}
