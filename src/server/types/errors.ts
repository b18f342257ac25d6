/**
 * Centralized error type definitions for the catalog extractor
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Raw page input for a document is missing or malformed.
 * Aborts that document only.
 */
export class InputUnavailableError extends AppError {
  public readonly documentId: string;

  constructor(documentId: string, reason: string, context?: Record<string, unknown>) {
    super(
      `Input unavailable for document '${documentId}': ${reason}`,
      ErrorCode.INPUT_UNAVAILABLE,
      422,
      true,
      { documentId, ...context }
    );
    this.documentId = documentId;
  }
}

export class OcrUnavailableError extends AppError {
  constructor(provider: string, message: string, context?: Record<string, unknown>) {
    super(
      `OCR provider unavailable (${provider}): ${message}`,
      ErrorCode.OCR_UNAVAILABLE,
      503,
      true,
      { provider, ...context }
    );
  }
}

/**
 * A value crossing the engine boundary does not satisfy its zod contract
 */
export class ContractValidationError extends AppError {
  constructor(message: string, public readonly issues: readonly { path: (string | number)[]; message: string }[]) {
    super(message, ErrorCode.CONTRACT_VALIDATION, 400, true, { issues });
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIGURATION_ERROR, 500, false, context);
  }
}

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  INPUT_UNAVAILABLE = 'INPUT_UNAVAILABLE',
  OCR_UNAVAILABLE = 'OCR_UNAVAILABLE',
  CONTRACT_VALIDATION = 'CONTRACT_VALIDATION',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}
