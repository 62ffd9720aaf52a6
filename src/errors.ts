export class AppError extends Error {
  constructor(
    public message: string,
    public statusCode: number,
    public errorCode?: string,
    public isOperational = true,
    public metadata?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: {
        message: this.message,
        statusCode: this.statusCode,
        ...(this.errorCode && { errorCode: this.errorCode }),
        ...(this.metadata && { metadata: this.metadata }),
      },
    };
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(`${resource} not found`, 404);
  }
}

export class ValidationError extends AppError {
  public errors?: Record<string, unknown>;

  constructor(message: string, errors?: Record<string, unknown>) {
    super(message, 400);
    this.errors = errors;
  }

  toJSON() {
    return {
      error: {
        message: this.message,
        statusCode: this.statusCode,
        ...(this.errors && { errors: this.errors }),
      },
    };
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, 'CONFLICT');
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(message = 'Service temporarily unavailable') {
    super(message, 503, 'SERVICE_UNAVAILABLE');
  }
}

export class GatewayTimeoutError extends AppError {
  constructor(message = 'Processing timed out') {
    super(message, 504, 'TIMEOUT');
  }
}

export class InternalServerError extends AppError {
  constructor(message = 'Internal server error') {
    super(message, 500, undefined, false);
  }
}
