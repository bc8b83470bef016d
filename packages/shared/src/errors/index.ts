/**
 * Custom error hierarchy for logbridge
 */

export type ErrorCategory =
  | 'TRANSPORT'
  | 'TRANSLATION'
  | 'SUBSCRIPTION'
  | 'SINK'
  | 'STATE_MACHINE'
  | 'CONFIGURATION'
  | 'UNKNOWN';

export type ErrorSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface ErrorContext {
  category: ErrorCategory;
  severity: ErrorSeverity;
  retryable: boolean;
  targetId?: string;
  [key: string]: unknown;
}

/**
 * Base error class for logbridge
 */
export class LogbridgeError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    context: Partial<ErrorContext> = {}
  ) {
    super(message);
    this.name = 'LogbridgeError';
    this.code = code;
    this.context = {
      category: context.category ?? 'UNKNOWN',
      severity: context.severity ?? 'MEDIUM',
      retryable: context.retryable ?? false,
      ...context,
    };
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }
}

/**
 * Reading or decoding the wire payload failed
 */
export class TransportError extends LogbridgeError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E1001', {
      category: 'TRANSPORT',
      severity: 'LOW',
      retryable: false,
      ...context,
    });
    this.name = 'TransportError';
  }
}

export type TranslationFailureReason = 'malformed' | 'dropped';

/**
 * A message could not become an entry
 */
export class TranslationError extends LogbridgeError {
  public readonly reason: TranslationFailureReason;

  constructor(reason: TranslationFailureReason, message: string, context: Partial<ErrorContext> = {}) {
    super(message, reason === 'malformed' ? 'E2001' : 'E2002', {
      category: 'TRANSLATION',
      severity: 'LOW',
      retryable: false,
      ...context,
    });
    this.name = 'TranslationError';
    this.reason = reason;
  }

  static malformed(message: string, context: Partial<ErrorContext> = {}): TranslationError {
    return new TranslationError('malformed', message, context);
  }

  static dropped(message: string, context: Partial<ErrorContext> = {}): TranslationError {
    return new TranslationError('dropped', message, context);
  }
}

/**
 * The subscription receive loop terminated unexpectedly
 */
export class SubscriptionError extends LogbridgeError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E3001', {
      category: 'SUBSCRIPTION',
      severity: 'HIGH',
      retryable: false,
      ...context,
    });
    this.name = 'SubscriptionError';
  }
}

export class SinkStoppedError extends LogbridgeError {
  constructor(context: Partial<ErrorContext> = {}) {
    super('Entry sink has been stopped', 'E4001', {
      category: 'SINK',
      severity: 'MEDIUM',
      retryable: true,
      ...context,
    });
    this.name = 'SinkStoppedError';
  }
}

export class InvalidTransitionError extends LogbridgeError {
  constructor(fromState: string, toState: string, context: Partial<ErrorContext> = {}) {
    super(`Invalid state transition: ${fromState} -> ${toState}`, 'E5001', {
      category: 'STATE_MACHINE',
      severity: 'MEDIUM',
      retryable: false,
      ...context,
    });
    this.name = 'InvalidTransitionError';
  }
}

export class ConfigurationError extends LogbridgeError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E6001', {
      category: 'CONFIGURATION',
      severity: 'CRITICAL',
      retryable: false,
      ...context,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Helper to check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof LogbridgeError) {
    return error.context.retryable;
  }
  return false;
}

/**
 * Helper to wrap unknown errors
 */
export function wrapError(error: unknown, context: Partial<ErrorContext> = {}): LogbridgeError {
  if (error instanceof LogbridgeError) {
    return error;
  }

  if (error instanceof Error) {
    return new LogbridgeError(error.message, 'E9999', {
      category: 'UNKNOWN',
      severity: 'MEDIUM',
      retryable: false,
      originalError: error.name,
      ...context,
    });
  }

  return new LogbridgeError(String(error), 'E9999', {
    category: 'UNKNOWN',
    severity: 'MEDIUM',
    retryable: false,
    ...context,
  });
}
