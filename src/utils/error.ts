export abstract class AppError extends Error {
  constructor(
    message: string,
    public readonly is_operational: boolean,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export enum SET_ERROR {
  CURSOR_OUT_OF_RANGE = "CURSOR_OUT_OF_RANGE",
  FOREIGN_CURSOR = "FOREIGN_CURSOR",
  INCOMPARABLE_VALUE = "INCOMPARABLE_VALUE",
  INVARIANT_VIOLATION = "INVARIANT_VIOLATION",
}

export class SetError extends AppError {
  constructor(
    public readonly category: SET_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, true, context);
  }
}

export function is_set_error(error: unknown): error is SetError {
  return error instanceof SetError;
}
