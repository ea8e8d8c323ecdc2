/**
 * Vault graph error classes
 *
 * Hierarchical errors with:
 * - Error codes (enum)
 * - User-facing messages (i18n)
 * - Original cause tracking
 * - Recovery hints
 */

import { t } from "../i18n/index.js";

// ============================================================================
// Error Codes
// ============================================================================

export enum ErrorCode {
  // Base errors (1000-1099)
  UNKNOWN = 1000,
  INTERNAL = 1001,

  // Validation errors (3000-3099)
  VALIDATION_REQUIRED_FIELD = 3000,
  VALIDATION_INVALID_FORMAT = 3001,
  VALIDATION_INVALID_PATH = 3002,
  VALIDATION_INVALID_OPTIONS = 3003,

  // File system errors (4000-4099)
  FS_FILE_NOT_FOUND = 4000,
  FS_PERMISSION_DENIED = 4001,
  FS_DIRECTORY_NOT_FOUND = 4004,
  FS_READ_ERROR = 4006,
  FS_WRITE_ERROR = 4007,

  // Config errors (5000-5099)
  CONFIG_PARSE_ERROR = 5001,
  CONFIG_INVALID_VALUE = 5002,
  CONFIG_VAULT_NOT_FOUND = 5003,
  CONFIG_NO_DEFAULT_VAULT = 5004,

  // Graph lookup errors (7000-7099)
  GRAPH_COMMUNITY_NOT_FOUND = 7000,
  GRAPH_NOTE_NOT_IN_GRAPH = 7001,
  GRAPH_NOTE_WITHOUT_COMMUNITY = 7002,
  GRAPH_INVALID_PHASE = 7003,
}

// ============================================================================
// Error Code to i18n Key Mapping
// ============================================================================

const ERROR_CODE_KEYS: Record<ErrorCode, string> = {
  [ErrorCode.UNKNOWN]: "unknown",
  [ErrorCode.INTERNAL]: "internal",
  [ErrorCode.VALIDATION_REQUIRED_FIELD]: "validation_required_field",
  [ErrorCode.VALIDATION_INVALID_FORMAT]: "validation_invalid_format",
  [ErrorCode.VALIDATION_INVALID_PATH]: "validation_invalid_path",
  [ErrorCode.VALIDATION_INVALID_OPTIONS]: "validation_invalid_options",
  [ErrorCode.FS_FILE_NOT_FOUND]: "fs_file_not_found",
  [ErrorCode.FS_PERMISSION_DENIED]: "fs_permission_denied",
  [ErrorCode.FS_DIRECTORY_NOT_FOUND]: "fs_directory_not_found",
  [ErrorCode.FS_READ_ERROR]: "fs_read_error",
  [ErrorCode.FS_WRITE_ERROR]: "fs_write_error",
  [ErrorCode.CONFIG_PARSE_ERROR]: "config_parse_error",
  [ErrorCode.CONFIG_INVALID_VALUE]: "config_invalid_value",
  [ErrorCode.CONFIG_VAULT_NOT_FOUND]: "config_vault_not_found",
  [ErrorCode.CONFIG_NO_DEFAULT_VAULT]: "config_no_default_vault",
  [ErrorCode.GRAPH_COMMUNITY_NOT_FOUND]: "graph_community_not_found",
  [ErrorCode.GRAPH_NOTE_NOT_IN_GRAPH]: "graph_note_not_in_graph",
  [ErrorCode.GRAPH_NOTE_WITHOUT_COMMUNITY]: "graph_note_without_community",
  [ErrorCode.GRAPH_INVALID_PHASE]: "graph_invalid_phase",
};

// ============================================================================
// User-friendly error messages (i18n)
// ============================================================================

interface ErrorMessages {
  minimal: string;
  medium: string;
  detailed: string;
}

function getErrorMessages(code: ErrorCode): ErrorMessages {
  const key = ERROR_CODE_KEYS[code];
  return {
    minimal: t(`errors:codes.${key}.minimal`),
    medium: t(`errors:codes.${key}.medium`),
    detailed: t(`errors:codes.${key}.detailed`),
  };
}

function getRecoveryHintForCode(code: ErrorCode): string | undefined {
  const key = ERROR_CODE_KEYS[code];
  const hint = t(`errors:recovery_hints.${key}`, { defaultValue: "" });
  return hint || undefined;
}

// Codes with a translated recovery hint
const RECOVERY_HINT_CODES = new Set<ErrorCode>([
  ErrorCode.FS_DIRECTORY_NOT_FOUND,
  ErrorCode.FS_PERMISSION_DENIED,
  ErrorCode.CONFIG_VAULT_NOT_FOUND,
  ErrorCode.CONFIG_NO_DEFAULT_VAULT,
  ErrorCode.GRAPH_NOTE_NOT_IN_GRAPH,
  ErrorCode.GRAPH_NOTE_WITHOUT_COMMUNITY,
]);

// ============================================================================
// Base Error Class
// ============================================================================

export interface VaultGraphErrorOptions {
  cause?: Error;
  recoverable?: boolean;
  recoveryHint?: string;
}

export class VaultGraphError extends Error {
  public readonly code: ErrorCode;
  public readonly recoverable: boolean;
  public readonly recoveryHint?: string;
  public readonly cause?: Error;
  public readonly timestamp: Date;

  constructor(code: ErrorCode, message?: string, options?: VaultGraphErrorOptions) {
    const messages = getErrorMessages(code);
    const baseMessage = message || messages.medium || t("errors:format.fallback_error");
    super(baseMessage);

    this.name = "VaultGraphError";
    this.code = code;
    this.cause = options?.cause;
    // Analysis is deterministic, so nothing is worth retrying
    this.recoverable = options?.recoverable ?? false;
    this.recoveryHint =
      options?.recoveryHint ??
      (RECOVERY_HINT_CODES.has(code) ? getRecoveryHintForCode(code) : undefined);
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get user-friendly message at specified detail level
   */
  getUserMessage(level: "minimal" | "medium" | "detailed" = "medium"): string {
    if (level === "medium") {
      return this.message;
    }
    const messages = getErrorMessages(this.code);
    return messages[level] || this.message;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      recoverable: this.recoverable,
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
 * Invalid options or arguments
 */
export class ValidationError extends VaultGraphError {
  public readonly field?: string;
  public readonly value?: unknown;

  constructor(
    code: ErrorCode,
    message?: string,
    options?: VaultGraphErrorOptions & { field?: string; value?: unknown }
  ) {
    super(code, message, options);
    this.name = "ValidationError";
    this.field = options?.field;
    this.value = options?.value;
  }
}

export type FileOperation = "read" | "write" | "stat" | "mkdir" | "scan";

/**
 * File system errors
 */
export class FileSystemError extends VaultGraphError {
  public readonly path?: string;
  public readonly operation?: FileOperation;

  constructor(
    code: ErrorCode,
    message?: string,
    options?: VaultGraphErrorOptions & { path?: string; operation?: FileOperation }
  ) {
    super(code, message, options);
    this.name = "FileSystemError";
    this.path = options?.path;
    this.operation = options?.operation;
  }

  /**
   * Create FileSystemError from a Node.js error
   */
  static fromNodeError(
    error: NodeJS.ErrnoException,
    path?: string,
    operation?: FileOperation
  ): FileSystemError {
    const where = path ? `: ${path}` : "";

    switch (error.code) {
      case "ENOENT":
        return new FileSystemError(
          operation === "scan" ? ErrorCode.FS_DIRECTORY_NOT_FOUND : ErrorCode.FS_FILE_NOT_FOUND,
          operation === "scan" ? `Vault directory not found${where}` : `File not found${where}`,
          { cause: error, path, operation }
        );
      case "ENOTDIR":
        return new FileSystemError(ErrorCode.FS_DIRECTORY_NOT_FOUND, `Not a directory${where}`, {
          cause: error,
          path,
          operation,
        });
      case "EACCES":
      case "EPERM":
        return new FileSystemError(ErrorCode.FS_PERMISSION_DENIED, `Permission denied${where}`, {
          cause: error,
          path,
          operation,
        });
      default:
        return new FileSystemError(
          operation === "write" || operation === "mkdir"
            ? ErrorCode.FS_WRITE_ERROR
            : ErrorCode.FS_READ_ERROR,
          error.message,
          { cause: error, path, operation }
        );
    }
  }
}

/**
 * Configuration errors
 */
export class ConfigError extends VaultGraphError {
  public readonly configKey?: string;

  constructor(
    code: ErrorCode,
    message?: string,
    options?: VaultGraphErrorOptions & { configKey?: string }
  ) {
    super(code, message, options);
    this.name = "ConfigError";
    this.configKey = options?.configKey;
  }
}

/**
 * Report-level lookup failures (unknown community, note filtered out, ...)
 */
export class GraphLookupError extends VaultGraphError {
  public readonly query: string;

  constructor(
    code: ErrorCode,
    query: string,
    message?: string,
    options?: VaultGraphErrorOptions
  ) {
    super(code, message, options);
    this.name = "GraphLookupError";
    this.query = query;
  }
}

// ============================================================================
// Error Formatter Utilities
// ============================================================================

export type ErrorLevel = "minimal" | "medium" | "detailed";

/**
 * Format error for user display based on detail level
 */
export function formatErrorForUser(error: unknown, level: ErrorLevel = "medium"): string {
  if (error instanceof VaultGraphError) {
    let message = error.getUserMessage(level);

    if (level !== "minimal" && error.recoveryHint) {
      message += `\n\n${t("errors:format.hint")} ${error.recoveryHint}`;
    }

    if (level === "detailed") {
      message += `\n\n[${t("errors:format.error_code")} ${error.code}]`;
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
    switch (level) {
      case "minimal":
        return t("errors:format.standard_error_minimal");
      case "medium":
        return t("errors:format.standard_error_medium", { message: error.message });
      case "detailed":
        return t("errors:format.standard_error_detailed", {
          message: error.message,
          stack: error.stack || "",
        });
    }
  }

  return level === "minimal"
    ? t("errors:format.standard_error_minimal")
    : t("errors:format.standard_error_medium", { message: String(error) });
}

function isErrnoException(error: Error): error is NodeJS.ErrnoException {
  return "code" in error && typeof Reflect.get(error, "code") === "string";
}

/**
 * Convert any thrown value to a VaultGraphError
 */
export function toVaultGraphError(error: unknown): VaultGraphError {
  if (error instanceof VaultGraphError) {
    return error;
  }

  if (error instanceof Error) {
    if (isErrnoException(error) && error.code) {
      if (["ENOENT", "ENOTDIR", "EACCES", "EPERM"].includes(error.code)) {
        return FileSystemError.fromNodeError(error, error.path);
      }
    }
    return new VaultGraphError(ErrorCode.UNKNOWN, error.message, { cause: error });
  }

  return new VaultGraphError(ErrorCode.UNKNOWN, String(error));
}
