/**
 * Types shared by the agent runtime components
 */

import type { AgentError } from '@brokerline/types';

/**
 * Where a reported error came from
 */
export type ErrorSource = 'handler' | 'subscription' | 'response' | 'connection' | 'publisher';

export interface ErrorContext {
  source: ErrorSource;
  topic?: string;
  pattern?: string;
  correlationId?: string;
}

/**
 * Receives errors that have no caller to propagate to
 */
export type ErrorSink = (error: AgentError, context: ErrorContext) => void;
