export interface ErrorDetail {
  field: string;
  message: string;
}

export class AppError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public isOperational = true,
  ) {
    super(message);
    this.name = "AppError";
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

/**
 * Request input outside its closed domain. Raised before any computation.
 */
export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly details: ErrorDetail[] = [],
  ) {
    super(400, message);
    this.name = "ValidationError";
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Invalid weights, domains, regime file or environment. Fatal at startup.
 */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(500, message, false);
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * A Metric Store record that cannot be aggregated. Logged and skipped.
 */
export class DataIntegrityError extends AppError {
  constructor(
    message: string,
    public readonly recordKind: "agent" | "assignment",
    public readonly recordId: number,
  ) {
    super(500, message);
    this.name = "DataIntegrityError";
    Object.setPrototypeOf(this, DataIntegrityError.prototype);
  }
}
