/**
 * Pipeline Error System — Typed errors for the ordering workflow
 *
 * Error Hierarchy:
 * - PipelineError (base)
 *   - SessionError (session lifecycle, stage transitions)
 *   - VendorError (marketplace REST calls)
 *   - ValidationError (request bodies, tool arguments)
 *   - LLMError (chat completion failures)
 *   - TranslationError (machine translation)
 *   - ConfigError (environment)
 *
 * The first block of codes is the placement/vendor taxonomy surfaced to
 * agents as `error_type`; the numbered codes are internal.
 */

import type { ZodError } from 'zod';

export enum ErrorCode {
  AUTH_ERROR = 'AUTH_ERROR',
  DATA_ERROR = 'DATA_ERROR',
  ADDRESS_ERROR = 'ADDRESS_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  API_ERROR = 'API_ERROR',
  PARSING_ERROR = 'PARSING_ERROR',
  TIMEOUT_ERROR = 'TIMEOUT_ERROR',
  CONNECTION_ERROR = 'CONNECTION_ERROR',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',

  // Session errors (1xxx)
  SESSION_NOT_FOUND = 'E1001',
  SESSION_INVALID_TRANSITION = 'E1004',

  // LLM errors (6xxx)
  LLM_API_KEY_MISSING = 'E6001',
  LLM_REQUEST_FAILED = 'E6002',
  LLM_RESPONSE_INVALID = 'E6003',

  // Translation errors (5xxx)
  TRANSLATION_FAILED = 'E5001',

  // Config errors (7xxx)
  CONFIG_INVALID = 'E7001',
}

export interface ErrorContext {
  sessionId?: string;
  endpoint?: string;
  agentId?: string;
  statusCode?: number;
  timestamp: string;
  recoverable: boolean;
  retryable: boolean;
  suggestion?: string;
}

/**
 * Base error class for all pipeline errors
 */
export class PipelineError extends Error {
  readonly code: ErrorCode;
  readonly context: ErrorContext;
  readonly originalError?: Error;

  constructor(
    code: ErrorCode,
    message: string,
    context: Partial<ErrorContext> = {},
    originalError?: Error
  ) {
    super(`[${code}] ${message}`);
    this.name = 'PipelineError';
    this.code = code;
    this.context = {
      timestamp: new Date().toISOString(),
      recoverable: false,
      retryable: false,
      ...context,
    };
    this.originalError = originalError;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      originalError: this.originalError?.message,
    };
  }
}

/**
 * Session lifecycle errors
 */
export class SessionError extends PipelineError {
  constructor(
    code: ErrorCode,
    message: string,
    sessionId?: string,
    context: Partial<ErrorContext> = {}
  ) {
    super(code, message, { ...context, sessionId });
    this.name = 'SessionError';
  }

  static notFound(sessionId: string): SessionError {
    return new SessionError(
      ErrorCode.SESSION_NOT_FOUND,
      `Session not found: ${sessionId}`,
      sessionId,
      {
        recoverable: false,
        retryable: false,
        suggestion: 'Send a chat message with this sessionId to create it.',
      }
    );
  }

  static invalidTransition(sessionId: string, from: string, to: string, reason: string): SessionError {
    return new SessionError(
      ErrorCode.SESSION_INVALID_TRANSITION,
      `Rejected hand-off ${from} → ${to}: ${reason}`,
      sessionId,
      {
        agentId: from,
        recoverable: true,
        retryable: false,
      }
    );
  }
}

/**
 * Marketplace REST errors
 */
export class VendorError extends PipelineError {
  constructor(
    code: ErrorCode,
    message: string,
    endpoint: string,
    context: Partial<ErrorContext> = {},
    originalError?: Error
  ) {
    super(code, message, { ...context, endpoint }, originalError);
    this.name = 'VendorError';
  }

  static authMissing(endpoint: string): VendorError {
    return new VendorError(
      ErrorCode.AUTH_ERROR,
      'User authentication token is required',
      endpoint,
      {
        recoverable: false,
        retryable: false,
        suggestion: 'Sign in again to refresh the session token.',
      }
    );
  }

  static timeout(endpoint: string, timeoutMs: number): VendorError {
    return new VendorError(
      ErrorCode.TIMEOUT_ERROR,
      `Request timed out after ${timeoutMs}ms`,
      endpoint,
      {
        recoverable: true,
        retryable: true,
        suggestion: 'Marketplace API is slow. Retry shortly.',
      }
    );
  }

  static connection(endpoint: string, cause: unknown): VendorError {
    const original = cause instanceof Error ? cause : undefined;
    return new VendorError(
      ErrorCode.CONNECTION_ERROR,
      `Network error: ${original?.message ?? String(cause)}`,
      endpoint,
      {
        recoverable: true,
        retryable: true,
        suggestion: 'Check VENDOR_API_URL and network connectivity.',
      },
      original
    );
  }

  static parsing(endpoint: string, statusCode: number): VendorError {
    return new VendorError(
      ErrorCode.PARSING_ERROR,
      'Failed to parse API response',
      endpoint,
      { statusCode, recoverable: false, retryable: false }
    );
  }

  static api(endpoint: string, statusCode: number, message: string): VendorError {
    return new VendorError(
      ErrorCode.API_ERROR,
      message,
      endpoint,
      {
        statusCode,
        recoverable: true,
        retryable: statusCode >= 500,
        suggestion: statusCode >= 500 ? 'Server error - retry may succeed' : 'Check request payload',
      }
    );
  }
}

/**
 * Validation errors
 */
export class ValidationError extends PipelineError {
  constructor(
    code: ErrorCode,
    message: string,
    context: Partial<ErrorContext> = {}
  ) {
    super(code, message, context);
    this.name = 'ValidationError';
  }

  static fromZod(location: string, error: ZodError): ValidationError {
    const detail = error.issues
      .map((issue) => `${issue.path.join('.') || location}: ${issue.message}`)
      .join('; ');
    return new ValidationError(
      ErrorCode.VALIDATION_ERROR,
      `Invalid ${location}: ${detail}`,
      {
        recoverable: true,
        retryable: false,
        suggestion: `Fix ${location} and resend.`,
      }
    );
  }
}

/**
 * LLM API errors
 */
export class LLMError extends PipelineError {
  constructor(
    code: ErrorCode,
    message: string,
    context: Partial<ErrorContext> = {}
  ) {
    super(code, message, context);
    this.name = 'LLMError';
  }

  static apiKeyMissing(): LLMError {
    return new LLMError(
      ErrorCode.LLM_API_KEY_MISSING,
      'No LLM API key configured',
      {
        recoverable: false,
        retryable: false,
        suggestion: 'Set OPENROUTER_API_KEY, OPENAI_API_KEY or LLM_API_KEY.',
      }
    );
  }

  static requestFailed(status: number, body: string): LLMError {
    return new LLMError(
      ErrorCode.LLM_REQUEST_FAILED,
      `Chat completion failed with HTTP ${status}: ${body.slice(0, 200)}`,
      {
        statusCode: status,
        recoverable: true,
        retryable: status === 429 || status >= 500,
      }
    );
  }

  static responseInvalid(reason: string): LLMError {
    return new LLMError(
      ErrorCode.LLM_RESPONSE_INVALID,
      `Invalid LLM response: ${reason}`,
      {
        recoverable: true,
        retryable: true,
      }
    );
  }
}

/**
 * Machine translation errors
 */
export class TranslationError extends PipelineError {
  constructor(
    code: ErrorCode,
    message: string,
    context: Partial<ErrorContext> = {},
    originalError?: Error
  ) {
    super(code, message, context, originalError);
    this.name = 'TranslationError';
  }

  static failed(endpoint: string, reason: string, statusCode?: number): TranslationError {
    return new TranslationError(
      ErrorCode.TRANSLATION_FAILED,
      `Translation failed: ${reason}`,
      {
        endpoint,
        statusCode,
        recoverable: true,
        retryable: statusCode === undefined || statusCode >= 500,
      }
    );
  }
}

/**
 * Configuration errors
 */
export class ConfigError extends PipelineError {
  constructor(
    code: ErrorCode,
    message: string,
    context: Partial<ErrorContext> = {}
  ) {
    super(code, message, context);
    this.name = 'ConfigError';
  }

  static invalid(reason: string): ConfigError {
    return new ConfigError(
      ErrorCode.CONFIG_INVALID,
      `Invalid configuration: ${reason}`,
      {
        recoverable: false,
        retryable: false,
        suggestion: 'Fix the environment (.env) and restart.',
      }
    );
  }
}

/**
 * Error handler utilities
 */
export const ErrorHandler = {
  isRetryable(error: unknown): boolean {
    if (error instanceof PipelineError) {
      return error.context.retryable;
    }
    return false;
  },

  /**
   * Format error for API response
   */
  toAPIResponse(error: unknown): { success: false; error: string; code?: string; suggestion?: string } {
    if (error instanceof PipelineError) {
      return {
        success: false,
        error: error.message,
        code: error.code,
        suggestion: error.context.suggestion,
      };
    }

    return {
      success: false,
      error: error instanceof Error ? error.message : 'Unknown error',
    };
  },

  /**
   * Log error with context
   */
  log(error: unknown, context?: Record<string, unknown>): void {
    if (error instanceof PipelineError) {
      console.error(`[${error.name}] ${error.code}: ${error.message}`);
      console.error('Context:', { ...error.context, ...context });
      if (error.originalError) {
        console.error('Original:', error.originalError);
      }
    } else if (error instanceof Error) {
      console.error(`[Error] ${error.message}`);
      console.error('Stack:', error.stack);
    } else {
      console.error('[Unknown Error]', error);
    }
  },
};
