import express, { Router, type Express, type NextFunction, type Request, type Response } from "express";
import type { AuthService } from "../auth";
import { toAccountSummary } from "../core/account";
import { asyncHandler, type AsyncRequestHandler } from "../middleware/asyncHandler";
import { authMiddleware, isAuthenticated } from "../middleware/authMiddleware";
import { AuthenticationError, NotFoundError, ValidationError } from "../utils/errors";
import { errorHandler, sendSuccess } from "../utils/response";

export const AUTH_BASE_PATH = "/api/v1/auth";

type Body = Record<string, unknown>;

function readBody(req: Request): Body {
  const body: unknown = req.body;
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    return {};
  }
  return Object.fromEntries(Object.entries(body));
}

/** String field from a JSON body; anything else counts as missing. */
function field(body: Body, key: string): string | undefined {
  const value = body[key];
  return typeof value === "string" ? value : undefined;
}

export type AuthRouteHandlers = Record<
  | "signup"
  | "signin"
  | "verifyEmail"
  | "resendVerification"
  | "forgotPassword"
  | "resetPassword"
  | "refreshToken"
  | "me"
  | "health",
  AsyncRequestHandler
>;

// Missing fields become empty strings here and are reported as "<field> is required" by the core.
export function createAuthHandlers(auth: AuthService): AuthRouteHandlers {
  return {
    async signup(req, res) {
      const body = readBody(req);
      const result = await auth.signup({
        email: field(body, "email") ?? "",
        name: field(body, "name") ?? "",
        password: field(body, "password") ?? "",
      });
      sendSuccess(res, result, 201);
    },

    async signin(req, res) {
      const body = readBody(req);
      sendSuccess(res, await auth.signin(field(body, "email") ?? "", field(body, "password") ?? ""));
    },

    async verifyEmail(req, res) {
      sendSuccess(res, await auth.verifyEmail(field(readBody(req), "token") ?? ""));
    },

    async resendVerification(req, res) {
      sendSuccess(res, await auth.resendVerification(field(readBody(req), "email") ?? ""));
    },

    async forgotPassword(req, res) {
      sendSuccess(res, await auth.requestPasswordReset(field(readBody(req), "email") ?? ""));
    },

    async resetPassword(req, res) {
      const body = readBody(req);
      sendSuccess(res, await auth.resetPassword(field(body, "token") ?? "", field(body, "newPassword") ?? ""));
    },

    async refreshToken(req, res) {
      sendSuccess(res, await auth.refreshToken(field(readBody(req), "refreshToken") ?? ""));
    },

    async me(req, res) {
      if (!isAuthenticated(req)) {
        throw new AuthenticationError();
      }
      sendSuccess(res, toAccountSummary(req.account));
    },

    async health(_req, res) {
      sendSuccess(res, { status: "healthy", service: "authentication" });
    },
  };
}

export function createAuthRouter(auth: AuthService): Router {
  const handlers = createAuthHandlers(auth);
  const router = Router();

  router.post("/signup", asyncHandler(handlers.signup));
  router.post("/signin", asyncHandler(handlers.signin));
  router.post("/verify-email", asyncHandler(handlers.verifyEmail));
  router.post("/resend-verification", asyncHandler(handlers.resendVerification));
  router.post("/forgot-password", asyncHandler(handlers.forgotPassword));
  router.post("/reset-password", asyncHandler(handlers.resetPassword));
  router.post("/refresh-token", asyncHandler(handlers.refreshToken));
  router.get("/me", authMiddleware(auth), asyncHandler(handlers.me));
  router.get("/health", asyncHandler(handlers.health));

  return router;
}

/** Turn express.json() parse failures into a client error. */
export function jsonSyntaxErrorHandler(err: unknown, _req: Request, _res: Response, next: NextFunction): void {
  if (err instanceof SyntaxError && "body" in err) {
    next(new ValidationError("Request body must be valid JSON"));
    return;
  }
  next(err);
}

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
}

export function createApp(auth: AuthService): Express {
  const app = express();
  app.disable("x-powered-by");
  app.use(express.json({ limit: "100kb" }));
  app.use(AUTH_BASE_PATH, createAuthRouter(auth));
  app.use(notFoundHandler);
  app.use(jsonSyntaxErrorHandler);
  app.use(errorHandler);
  return app;
}
