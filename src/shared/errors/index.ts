/**
 * Error Hierarchy
 *
 * Centralized error definitions for the application
 */
import { isNotionClientError } from "@notionhq/client";

export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      context: this.context,
      stack: this.stack
    };
  }
}

export class ConfigurationError extends DomainError {
  readonly code = "CONFIGURATION_ERROR";
  readonly statusCode = 400;
}

// Infrastructure Errors
export class NotionApiError extends DomainError {
  readonly code = "NOTION_API_ERROR";
  readonly statusCode = 502;

  constructor(
    message: string,
    public readonly notionErrorCode?: string,
    context?: Record<string, unknown>
  ) {
    super(message, { ...context, notionErrorCode });
  }
}

export class RateLimitError extends DomainError {
  readonly code = "RATE_LIMIT_ERROR";
  readonly statusCode = 429;

  constructor(
    message: string,
    public readonly retryAfter?: number,
    context?: Record<string, unknown>
  ) {
    super(message, { ...context, retryAfter });
  }
}

export class FileSystemError extends DomainError {
  readonly code = "FILESYSTEM_ERROR";
  readonly statusCode = 500;
}

export class NetworkError extends DomainError {
  readonly code = "NETWORK_ERROR";
  readonly statusCode = 502;
}

/**
 * Shape shared by Node system errors (`errno`, `syscall`, `path`).
 */
type SystemErrorFields = {
  code?: unknown;
  errno?: unknown;
  syscall?: unknown;
  path?: unknown;
};

const fields = (error: unknown): SystemErrorFields => (typeof error === "object" && error !== null ? error : {});

/**
 * Message of anything thrown, for logs and export statistics.
 */
export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

// Error Factory
export class ErrorFactory {
  static fromNotionError(error: unknown): NotionApiError {
    const message = errorMessage(error) || "Unknown Notion API error";
    const code = isNotionClientError(error) ? error.code : String(fields(error).code ?? "unknown");

    return new NotionApiError(message, code, { originalError: error });
  }

  static fromFileSystemError(error: unknown, operation: string): FileSystemError {
    const { path, code } = fields(error);

    return new FileSystemError(`File system error during ${operation}: ${errorMessage(error)}`, {
      operation,
      originalError: error,
      path,
      code
    });
  }

  static fromNetworkError(error: unknown): NetworkError {
    const { code, errno, syscall } = fields(error);

    return new NetworkError(`Network error: ${errorMessage(error)}`, {
      originalError: error,
      code,
      errno,
      syscall
    });
  }
}
