// Shared types for Brokerline

export {
  isQoS,
  toReceiver,
  createMessage,
  type QoS,
  type Message,
  type MessageHandler,
  type MessageReceiver,
  type Subscriber,
  type RequestEnvelope,
} from './messages.js';

export {
  AgentErrorCodes,
  AgentError,
  ConnectionError,
  SessionLostError,
  TimeoutError,
  CancellationError,
  BackpressureError,
  DeliveryFailureError,
  SubscriptionError,
  InvalidStateError,
  InvalidTopicError,
  InvalidMessageError,
  isAgentError,
  hasErrorCode,
  wrapError,
  extractErrorInfo,
  type AgentErrorCode,
  type AgentErrorOptions,
} from './errors.js';

export {
  validate,
  validateOrThrow,
  isValid,
  type ValidationIssue,
  type ValidationResult,
} from './validation.js';
