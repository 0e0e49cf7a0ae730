/**
 * Arma Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import { ERROR_REGISTRY, renderMessage } from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface ArmaErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create an error from the registry.
 *
 * @param errorId - Error identifier (format: ARMA-{category}{3-digit})
 * @param context - Values for the template placeholders
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError("ARMA-C007", { expectedCount: 2, actualCount: 3 })
 * // Creates ConversionError: "Expected 2 arguments, got 3"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>
): ConversionError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const message = renderMessage(definition.messageTemplate, context);
  return new ConversionError(errorId, message, context);
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all Arma conversion errors.
 * Provides structured data for host applications to format as needed.
 */
export class ArmaError extends Error {
  readonly errorId: string;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: ArmaErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    super(data.message);
    this.name = 'ArmaError';
    this.errorId = data.errorId;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): ArmaErrorData {
    return {
      errorId: this.errorId,
      message: this.message,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: ArmaErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return `${this.errorId}: ${this.message}`;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Inbound conversion errors */
export class ConversionError extends ArmaError {
  constructor(
    errorId: string,
    message: string,
    context?: Record<string, unknown>
  ) {
    super({ errorId, message, context });
    this.name = 'ConversionError';
  }
}
