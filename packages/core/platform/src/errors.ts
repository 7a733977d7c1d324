/**
 * Platform REST API errors
 *
 * Each status the platform documents gets its own class; anything else
 * becomes a plain HttpError.
 */

import { AgentError, AgentErrorCodes } from '@brokerline/types';

export interface HttpErrorOptions {
  status: number;
  url: string;
  /** Response body as text */
  body: string;
}

export class HttpError extends AgentError {
  readonly status: number;
  readonly url: string;
  readonly body: string;

  constructor(message: string, options: HttpErrorOptions) {
    super(AgentErrorCodes.HTTP, message, {
      component: 'platform-http',
      details: { status: options.status, url: options.url },
    });
    this.name = 'HttpError';
    this.status = options.status;
    this.url = options.url;
    this.body = options.body;
  }
}

/** 400 */
export class BadParamsError extends HttpError {
  constructor(options: HttpErrorOptions) {
    super(options.body || 'Bad request parameters', options);
    this.name = 'BadParamsError';
  }
}

/** 401 */
export class UnauthorizedError extends HttpError {
  constructor(options: HttpErrorOptions) {
    super(options.body || 'Unauthorized', options);
    this.name = 'UnauthorizedError';
  }
}

/** 404 */
export class NotFoundError extends HttpError {
  constructor(options: HttpErrorOptions) {
    super(options.body || 'Not found', options);
    this.name = 'NotFoundError';
  }
}

/** 500 */
export class InternalServerError extends HttpError {
  constructor(options: HttpErrorOptions) {
    super(options.body || 'Internal server error', options);
    this.name = 'InternalServerError';
  }
}

/**
 * Map a non-200 response onto the error taxonomy
 */
export function toHttpError(options: HttpErrorOptions): HttpError {
  switch (options.status) {
    case 400:
      return new BadParamsError(options);
    case 401:
      return new UnauthorizedError(options);
    case 404:
      return new NotFoundError(options);
    case 500:
      return new InternalServerError(options);
    default:
      return new HttpError(
        `'${options.url}' returned unexpected status ${options.status} with body '${options.body}'`,
        options
      );
  }
}
