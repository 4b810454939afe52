import {
  AuthenticationError,
  AuthorizationError,
  ConflictError,
  InternalServerError,
  NotFoundError,
  ServiceError,
  ValidationError,
} from '../../utils/errors';

describe('Error classes', () => {
  it.each([
    [new ValidationError(), 422, 'Validation failed', 'ValidationError'],
    [new AuthenticationError(), 401, 'Authentication required', 'AuthenticationError'],
    [new AuthorizationError(), 403, 'Forbidden', 'AuthorizationError'],
    [new NotFoundError(), 404, 'Not Found', 'NotFoundError'],
    [new ConflictError(), 409, 'Conflict', 'ConflictError'],
    [new InternalServerError(), 500, 'Internal Server Error', 'InternalServerError'],
  ])('%s carries status %i', (error, status, message, name) => {
    expect(error).toBeInstanceOf(ServiceError);
    expect(error).toBeInstanceOf(Error);
    expect(error.statusCode).toBe(status);
    expect(error.message).toBe(message);
    expect(error.name).toBe(name);
  });

  it('exposes client errors and hides server errors', () => {
    expect(new ConflictError().expose).toBe(true);
    expect(new AuthenticationError().expose).toBe(true);
    expect(new InternalServerError().expose).toBe(false);
    expect(new ServiceError('upstream unavailable', 503).expose).toBe(false);
  });

  it('keeps custom messages', () => {
    const error = new ValidationError('Email already registered');
    expect(error.message).toBe('Email already registered');
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).not.toBeInstanceOf(AuthenticationError);
  });
});
