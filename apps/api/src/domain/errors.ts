export type ErrorCode =
  | "NOT_FOUND"
  | "ALREADY_EXISTS"
  | "INVALID_CREDENTIALS"
  | "SLOT_CONFLICT"
  | "INVALID_ARGUMENT"
  | "EXTERNAL_SERVICE_UNAVAILABLE";

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;

  constructor(code: ErrorCode, statusCode: number, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super("NOT_FOUND", 404, message);
  }
}

export class AlreadyExistsError extends AppError {
  constructor(message: string) {
    super("ALREADY_EXISTS", 409, message);
  }
}

export class InvalidCredentialsError extends AppError {
  constructor(message = "Invalid credentials") {
    super("INVALID_CREDENTIALS", 401, message);
  }
}

export class SlotConflictError extends AppError {
  constructor(message: string) {
    super("SLOT_CONFLICT", 409, message);
  }
}

export class InvalidArgumentError extends AppError {
  public readonly allowed?: readonly string[];

  constructor(message: string, allowed?: readonly string[]) {
    super("INVALID_ARGUMENT", 400, message);
    this.allowed = allowed;
  }
}

export class ExternalServiceUnavailableError extends AppError {
  public readonly service: string;

  constructor(service: string, message: string) {
    super("EXTERNAL_SERVICE_UNAVAILABLE", 503, message);
    this.service = service;
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}
