export class ServiceError extends Error {
    statusCode: number;
    /** Whether the message is safe to show a client. Server faults are not. */
    readonly expose: boolean;

    constructor(message: string, statusCode: number) {
        super(message);
        this.statusCode = statusCode;
        this.expose = statusCode < 500;
        this.name = this.constructor.name;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/** Malformed or policy-violating input, including invalid or expired single-use tokens. */
export class ValidationError extends ServiceError {
    constructor(message = "Validation failed") {
        super(message, 422);
    }
}

export class AuthenticationError extends ServiceError {
    constructor(message = "Authentication required") {
        super(message, 401);
    }
}

export class AuthorizationError extends ServiceError {
    constructor(message = "Forbidden") {
        super(message, 403);
    }
}

export class NotFoundError extends ServiceError {
    constructor(message = "Not Found") {
        super(message, 404);
    }
}

export class ConflictError extends ServiceError {
    constructor(message = "Conflict") {
        super(message, 409);
    }
}

export class InternalServerError extends ServiceError {
    constructor(message = "Internal Server Error") {
        super(message, 500);
    }
}
