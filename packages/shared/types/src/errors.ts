/**
 * Brokerline Error Types
 *
 * Every failure the runtime surfaces to application code is an AgentError.
 * Transport-level errors are translated into one of these at the component
 * boundary and kept as `cause`.
 */

// ============================================================================
// Error Codes
// ============================================================================

/**
 * All Brokerline error codes
 */
export const AgentErrorCodes = {
  /** Handshake or authentication with the broker failed */
  CONNECTION: 'BROKERLINE_ERR_CONNECTION',
  /** The session dropped while the operation was outstanding */
  SESSION_LOST: 'BROKERLINE_ERR_SESSION_LOST',
  /** Deadline exceeded */
  TIMEOUT: 'BROKERLINE_ERR_TIMEOUT',
  /** Operation cancelled by the caller */
  CANCELLED: 'BROKERLINE_ERR_CANCELLED',
  /** Outbound queue is full */
  BACKPRESSURE: 'BROKERLINE_ERR_BACKPRESSURE',
  /** Publish job dropped after exhausting its retries */
  DELIVERY_FAILED: 'BROKERLINE_ERR_DELIVERY_FAILED',
  /** Broker refused a subscription */
  SUBSCRIPTION: 'BROKERLINE_ERR_SUBSCRIPTION',
  /** Operation not allowed in the current state */
  INVALID_STATE: 'BROKERLINE_ERR_INVALID_STATE',
  /** Malformed topic or topic pattern */
  INVALID_TOPIC: 'BROKERLINE_ERR_INVALID_TOPIC',
  /** Payload does not match the expected format */
  INVALID_MESSAGE: 'BROKERLINE_ERR_INVALID_MESSAGE',
  /** The platform REST API answered with an error status */
  HTTP: 'BROKERLINE_ERR_HTTP',
  /** Configuration error */
  CONFIG: 'BROKERLINE_ERR_CONFIG',
  /** Internal error */
  INTERNAL: 'BROKERLINE_ERR_INTERNAL',
} as const;

export type AgentErrorCode = (typeof AgentErrorCodes)[keyof typeof AgentErrorCodes];

// ============================================================================
// Error Class
// ============================================================================

/**
 * Options shared by every error constructor
 */
export interface AgentErrorOptions {
  /** Component that raised the error */
  component?: string;
  /** Additional structured details */
  details?: Record<string, unknown>;
  /** Correlation ID of the call the error belongs to */
  correlationId?: string;
  /** Underlying error, usually from the transport */
  cause?: unknown;
}

/**
 * Base error class for all Brokerline errors
 */
export class AgentError extends Error {
  /** Error code */
  readonly code: AgentErrorCode;
  /** Component that generated the error */
  readonly component: string;
  /** Additional error details */
  readonly details?: Record<string, unknown>;
  /** ISO 8601 timestamp */
  readonly timestamp: string;
  /** Correlation ID for tracing */
  readonly correlationId?: string;

  constructor(code: AgentErrorCode, message: string, options: AgentErrorOptions = {}) {
    super(message);
    this.name = 'AgentError';
    this.code = code;
    this.component = options.component ?? 'agent';
    this.details = options.details;
    this.timestamp = new Date().toISOString();
    this.correlationId = options.correlationId;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }

    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      component: this.component,
      details: this.details,
      timestamp: this.timestamp,
      correlationId: this.correlationId,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.message} (component: ${this.component})`;
  }
}

// ============================================================================
// Taxonomy
// ============================================================================

/** Handshake or authentication failure */
export class ConnectionError extends AgentError {
  constructor(message: string, options?: AgentErrorOptions) {
    super(AgentErrorCodes.CONNECTION, message, { component: 'connection', ...options });
    this.name = 'ConnectionError';
  }
}

/** The session left the Connected state while the operation was outstanding */
export class SessionLostError extends AgentError {
  constructor(message: string, options?: AgentErrorOptions) {
    super(AgentErrorCodes.SESSION_LOST, message, { component: 'connection', ...options });
    this.name = 'SessionLostError';
  }
}

/** A call or transport operation exceeded its deadline */
export class TimeoutError extends AgentError {
  constructor(message: string, options?: AgentErrorOptions) {
    super(AgentErrorCodes.TIMEOUT, message, options);
    this.name = 'TimeoutError';
  }
}

/** The caller cancelled the operation */
export class CancellationError extends AgentError {
  constructor(message: string, options?: AgentErrorOptions) {
    super(AgentErrorCodes.CANCELLED, message, options);
    this.name = 'CancellationError';
  }
}

/** The outbound queue reached its capacity */
export class BackpressureError extends AgentError {
  constructor(message: string, options?: AgentErrorOptions) {
    super(AgentErrorCodes.BACKPRESSURE, message, { component: 'publisher', ...options });
    this.name = 'BackpressureError';
  }
}

/** A publish job was dropped without confirmed delivery */
export class DeliveryFailureError extends AgentError {
  constructor(message: string, options?: AgentErrorOptions) {
    super(AgentErrorCodes.DELIVERY_FAILED, message, { component: 'publisher', ...options });
    this.name = 'DeliveryFailureError';
  }
}

/** The broker refused a subscription */
export class SubscriptionError extends AgentError {
  constructor(message: string, options?: AgentErrorOptions) {
    super(AgentErrorCodes.SUBSCRIPTION, message, { component: 'router', ...options });
    this.name = 'SubscriptionError';
  }
}

/** The operation is not allowed in the current state */
export class InvalidStateError extends AgentError {
  constructor(message: string, options?: AgentErrorOptions) {
    super(AgentErrorCodes.INVALID_STATE, message, options);
    this.name = 'InvalidStateError';
  }
}

/** Malformed topic or topic pattern */
export class InvalidTopicError extends AgentError {
  constructor(message: string, options?: AgentErrorOptions) {
    super(AgentErrorCodes.INVALID_TOPIC, message, options);
    this.name = 'InvalidTopicError';
  }
}

/** Payload failed to decode or validate */
export class InvalidMessageError extends AgentError {
  constructor(message: string, options?: AgentErrorOptions) {
    super(AgentErrorCodes.INVALID_MESSAGE, message, options);
    this.name = 'InvalidMessageError';
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Check if an error is an AgentError
 */
export function isAgentError(error: unknown): error is AgentError {
  return error instanceof AgentError;
}

/**
 * Check if an error has a specific error code
 */
export function hasErrorCode(error: unknown, code: AgentErrorCode): boolean {
  return isAgentError(error) && error.code === code;
}

/**
 * Wrap any error as an AgentError
 * If already an AgentError, returns as-is. Otherwise wraps as internal error.
 */
export function wrapError(error: unknown, options: AgentErrorOptions = {}): AgentError {
  if (isAgentError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AgentError(AgentErrorCodes.INTERNAL, error.message, { ...options, cause: error });
  }

  return new AgentError(AgentErrorCodes.INTERNAL, String(error), options);
}

/**
 * Extract error information suitable for logging
 */
export function extractErrorInfo(error: unknown): Record<string, unknown> {
  if (isAgentError(error)) {
    return error.toJSON();
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: String(error),
  };
}
