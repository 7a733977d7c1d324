// Shared utilities for Brokerline

export {
  ConsoleLogger,
  createLogger,
  childLogger,
  isLogLevel,
  silentLogger,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
} from './logger.js';

export { EventHub, type EventHandler } from './events.js';

export {
  toPayload,
  encodeJson,
  decodeText,
  decodeJson,
  bytesEqual,
  encodeBase64,
  type PayloadInput,
} from './payload.js';

export { MAX_TIMER_DELAY_MS, isTimerDelay, toMicros, fromMicros, withTimeout } from './time.js';
