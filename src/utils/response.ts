import type { Response, NextFunction, Request } from "express";
import { AuthenticationError, ServiceError } from "./errors";
import { createLogger } from "./logger";

const log = createLogger("http");

interface ApiResponse<T> {
    success: boolean;
    data?: T;
    error?: {
        message: string;
    };
}

export interface ErrorResponse {
    statusCode: number;
    message: string;
}

export const GENERIC_ERROR_MESSAGE = "An unexpected internal server error occurred.";

/**
 * Map any thrown value to what a client may see. Service errors keep their
 * status, and their message when it is exposable; everything else becomes a
 * bare 500.
 */
export function toErrorResponse(err: unknown): ErrorResponse {
    if (err instanceof ServiceError) {
        return { statusCode: err.statusCode, message: err.expose ? err.message : GENERIC_ERROR_MESSAGE };
    }
    return { statusCode: 500, message: GENERIC_ERROR_MESSAGE };
}

export function sendSuccess<T>(res: Response, data: T, statusCode = 200) {
    const response: ApiResponse<T> = {
        success: true,
        data,
    };
    res.status(statusCode).json(response);
}

export function sendError(res: Response, message: string, statusCode = 500) {
    const response: ApiResponse<null> = {
        success: false,
        error: {
            message,
        },
    };
    res.status(statusCode).json(response);
}

export function errorHandler(
    err: unknown,
    req: Request,
    res: Response,
    next: NextFunction
) {
    if (res.headersSent) {
        return next(err);
    }

    const { statusCode, message } = toErrorResponse(err);

    if (!(err instanceof ServiceError) || !err.expose) {
        log.error(`Unexpected error on ${req.method} ${req.originalUrl}:`, err);
    }

    if (err instanceof AuthenticationError) {
        res.setHeader("WWW-Authenticate", "Bearer");
    }

    return sendError(res, message, statusCode);
}
