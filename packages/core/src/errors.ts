export class AppError extends Error {
  constructor(
    public readonly code: string,
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "AppError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super("VALIDATION_ERROR", 400, message);
  }
}

export class UnsupportedTypeError extends AppError {
  constructor(message: string) {
    super("UNSUPPORTED_TYPE", 400, message);
  }
}

export class EmptyUploadError extends AppError {
  constructor(message = "No file provided") {
    super("EMPTY_UPLOAD", 400, message);
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(maxBytes: number) {
    super("FILE_TOO_LARGE", 413, `Maximum upload size is ${maxBytes} bytes.`);
  }
}

export class UnknownOperationError extends AppError {
  constructor(category: string, operation: string) {
    super("UNKNOWN_OPERATION", 404, `Unknown operation: ${category}/${operation}`);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super("NOT_FOUND", 404, `${resource} not found`);
  }
}

export class NotImplementedError extends AppError {
  constructor(message: string) {
    super("NOT_IMPLEMENTED", 501, message);
  }
}

/**
 * Library-level failure on otherwise well-formed input. Reported with HTTP 200
 * and `success: false`, since the transport itself succeeded.
 */
export class ProcessingError extends AppError {
  constructor(message: string, code = "PROCESSING_FAILED") {
    super(code, 200, message);
  }
}
