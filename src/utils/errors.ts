/**
 * syncpair error classes
 *
 * Provides a small hierarchy of errors with:
 * - Error codes (enum)
 * - User-facing messages resolved through i18n
 * - Original cause tracking
 * - Recovery hints
 *
 * Sync operations do not throw these past their own boundary; they report a
 * StepOutcome instead. The errors below cover validation, configuration and
 * file system failures that happen before any external command runs.
 */

import { t } from "../i18n/index.js";

// ============================================================================
// Error Codes
// ============================================================================

export enum ErrorCode {
  // Validation errors (3000-3099)
  VALIDATION_REQUIRED_FIELD = 3000,
  VALIDATION_INVALID_PATH = 3002,
  VALIDATION_DUPLICATE_NAME = 3005,

  // File system errors (4000-4099)
  FS_FILE_NOT_FOUND = 4000,
  FS_PERMISSION_DENIED = 4001,
  FS_READ_ERROR = 4006,
  FS_WRITE_ERROR = 4007,

  // Config errors (5000-5099)
  CONFIG_PARSE_ERROR = 5001,
  CONFIG_INVALID_VALUE = 5002,

  // Project and operation errors (7000-7099)
  PROJECT_NOT_FOUND = 7000,
  PROJECT_NOT_SELECTED = 7001,
}

const ERROR_CODE_KEYS: Record<ErrorCode, string> = {
  [ErrorCode.VALIDATION_REQUIRED_FIELD]: "validation_required_field",
  [ErrorCode.VALIDATION_INVALID_PATH]: "validation_invalid_path",
  [ErrorCode.VALIDATION_DUPLICATE_NAME]: "validation_duplicate_name",
  [ErrorCode.FS_FILE_NOT_FOUND]: "fs_file_not_found",
  [ErrorCode.FS_PERMISSION_DENIED]: "fs_permission_denied",
  [ErrorCode.FS_READ_ERROR]: "fs_read_error",
  [ErrorCode.FS_WRITE_ERROR]: "fs_write_error",
  [ErrorCode.CONFIG_PARSE_ERROR]: "config_parse_error",
  [ErrorCode.CONFIG_INVALID_VALUE]: "config_invalid_value",
  [ErrorCode.PROJECT_NOT_FOUND]: "project_not_found",
  [ErrorCode.PROJECT_NOT_SELECTED]: "project_not_selected",
};

// Codes that carry a translated recovery hint
const RECOVERY_HINT_CODES = new Set<ErrorCode>([
  ErrorCode.VALIDATION_INVALID_PATH,
  ErrorCode.VALIDATION_DUPLICATE_NAME,
  ErrorCode.CONFIG_PARSE_ERROR,
  ErrorCode.PROJECT_NOT_SELECTED,
]);

export type ErrorLevel = "minimal" | "detailed";

function getErrorMessage(code: ErrorCode): string {
  return t(`errors:codes.${ERROR_CODE_KEYS[code]}`);
}

function getRecoveryHintForCode(code: ErrorCode): string | undefined {
  const hint = t(`errors:recovery_hints.${ERROR_CODE_KEYS[code]}`, { defaultValue: "" });
  return hint || undefined;
}

// ============================================================================
// Base Error Class
// ============================================================================

export class SyncPairError extends Error {
  public readonly code: ErrorCode;
  public readonly recoveryHint?: string;
  public readonly cause?: Error;
  public readonly timestamp: Date;

  constructor(
    code: ErrorCode,
    message?: string,
    options?: {
      cause?: Error;
      recoveryHint?: string;
    }
  ) {
    super(message || getErrorMessage(code) || t("errors:format.fallback_error"));

    this.name = "SyncPairError";
    this.code = code;
    this.cause = options?.cause;
    this.recoveryHint =
      options?.recoveryHint ?? (RECOVERY_HINT_CODES.has(code) ? getRecoveryHintForCode(code) : undefined);
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      recoveryHint: this.recoveryHint,
      timestamp: this.timestamp.toISOString(),
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
          }
        : undefined,
      stack: this.stack,
    };
  }
}

// ============================================================================
// Specialized Error Classes
// ============================================================================

/**
 * Rejected user input, raised before anything is persisted or executed.
 */
export class ValidationError extends SyncPairError {
  public readonly field?: string;
  public readonly value?: unknown;

  constructor(
    code: ErrorCode,
    message?: string,
    options?: {
      cause?: Error;
      field?: string;
      value?: unknown;
      recoveryHint?: string;
    }
  ) {
    super(code, message, options);
    this.name = "ValidationError";
    this.field = options?.field;
    this.value = options?.value;
  }
}

export class ConfigError extends SyncPairError {
  public readonly configKey?: string;

  constructor(
    code: ErrorCode,
    message?: string,
    options?: {
      cause?: Error;
      configKey?: string;
      recoveryHint?: string;
    }
  ) {
    super(code, message, options);
    this.name = "ConfigError";
    this.configKey = options?.configKey;
  }
}

export class FileSystemError extends SyncPairError {
  public readonly path?: string;
  public readonly operation?: "read" | "write" | "access";

  constructor(
    code: ErrorCode,
    message?: string,
    options?: {
      cause?: Error;
      path?: string;
      operation?: "read" | "write" | "access";
    }
  ) {
    super(code, message, options);
    this.name = "FileSystemError";
    this.path = options?.path;
    this.operation = options?.operation;
  }

  /**
   * Create FileSystemError from Node.js error
   */
  static fromNodeError(
    error: NodeJS.ErrnoException,
    path?: string,
    operation?: FileSystemError["operation"]
  ): FileSystemError {
    switch (error.code) {
      case "ENOENT":
        return new FileSystemError(ErrorCode.FS_FILE_NOT_FOUND, undefined, { cause: error, path, operation });
      case "EACCES":
      case "EPERM":
        return new FileSystemError(ErrorCode.FS_PERMISSION_DENIED, undefined, { cause: error, path, operation });
      default:
        return new FileSystemError(
          operation === "write" ? ErrorCode.FS_WRITE_ERROR : ErrorCode.FS_READ_ERROR,
          error.message,
          { cause: error, path, operation }
        );
    }
  }
}

// ============================================================================
// Error Formatter Utilities
// ============================================================================

/**
 * Format error for user display
 */
export function formatErrorForUser(error: unknown, level: ErrorLevel = "minimal"): string {
  if (error instanceof SyncPairError) {
    let message = error.message;

    if (error.recoveryHint) {
      message += `\n${t("errors:format.hint")} ${error.recoveryHint}`;
    }

    if (level === "detailed") {
      message += `\n[${t("errors:format.error_code")} ${error.code}]`;
      if (error.cause) {
        message += `\n[${t("errors:format.cause")} ${error.cause.message}]`;
      }
      if (error instanceof FileSystemError && error.path) {
        message += `\n[${t("errors:format.path")} ${error.path}]`;
      }
    }

    return message;
  }

  if (error instanceof Error) {
    return level === "detailed" && error.stack ? error.stack : error.message;
  }

  return String(error);
}
