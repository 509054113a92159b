/**
 * Error handling utilities for API clients
 *
 * Transport-level problems never escape the executor as exceptions: they are
 * returned as FetchFailure values so one work item cannot abort a run.
 */

import { z } from 'zod';

/**
 * Base error class for all API-related errors
 */
export abstract class BaseAPIError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    // Maintains proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export type FetchFailureKind =
  | 'http'
  | 'rate_limited'
  | 'timeout'
  | 'transport'
  | 'malformed'
  | 'upstream';

/** Diagnostics keep only the head of a response body */
export const MAX_BODY_CHARS = 200;

const SECRET_PARAMS = new Set(['key', 'auth_token', 'api_key', 'apikey', 'token']);

/**
 * Mask credential-bearing query parameters so URLs can be logged
 *
 * @example
 * redactUrl('https://example.com/posts?auth_token=abc&size=50') // 'https://example.com/posts?auth_token=****&size=50'
 */
export function redactUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }
  for (const name of [...parsed.searchParams.keys()]) {
    if (SECRET_PARAMS.has(name.toLowerCase())) {
      parsed.searchParams.set(name, '****');
    }
  }
  return parsed.toString();
}

export function truncateBody(body: string | undefined): string | undefined {
  if (body === undefined) return undefined;
  return body.length > MAX_BODY_CHARS ? body.slice(0, MAX_BODY_CHARS) : body;
}

/**
 * FetchFailure - a request that did not produce a usable response after the
 * executor's retry policy. Returned, not thrown.
 */
export class FetchFailure extends BaseAPIError {
  readonly code = 'FETCH_FAILURE';
  readonly url: string;
  readonly body?: string;

  constructor(
    message: string,
    public readonly kind: FetchFailureKind,
    url: string,
    public readonly status?: number,
    body?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.url = redactUrl(url);
    this.body = truncateBody(body);
  }

  /**
   * Non-success status; 429 after the retry is reported as rate_limited
   */
  static fromStatus(url: string, status: number, statusText: string, body?: string): FetchFailure {
    if (status === 429) {
      return new FetchFailure('Rate limit exceeded after retry', 'rate_limited', url, status, body);
    }
    return new FetchFailure(
      `API request failed: ${status} ${statusText}`.trim(),
      'http',
      url,
      status,
      body
    );
  }

  static timeout(url: string, timeoutMs: number): FetchFailure {
    return new FetchFailure(`Request timeout after ${timeoutMs}ms`, 'timeout', url);
  }

  static transport(url: string, cause: unknown): FetchFailure {
    const error = cause instanceof Error ? cause : new Error(String(cause));
    const detail = error.cause instanceof Error ? `: ${error.cause.message}` : '';
    return new FetchFailure(`Network request failed${detail}`, 'transport', url, undefined, undefined, error);
  }

  static malformed(url: string, reason: string, body?: string, status?: number): FetchFailure {
    return new FetchFailure(`Malformed response: ${reason}`, 'malformed', url, status, body);
  }

  static fromZodError(url: string, error: z.ZodError, status?: number): FetchFailure {
    const issues = error.errors
      .map((issue) => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
      })
      .join(', ');
    return FetchFailure.malformed(url, issues, undefined, status);
  }

  /**
   * Errors reported inside a successful envelope (e.g. GraphQL `errors`)
   */
  static upstream(url: string, messages: string[], status = 200): FetchFailure {
    return new FetchFailure(
      `Upstream error: ${messages.join('; ') || 'unknown'}`,
      'upstream',
      url,
      status
    );
  }
}

/**
 * Extract failure details for structured logging
 */
export function getFailureDetails(failure: FetchFailure): {
  code: string;
  kind: FetchFailureKind;
  message: string;
  status?: number;
  url: string;
  body?: string;
} {
  return {
    code: failure.code,
    kind: failure.kind,
    message: failure.message,
    status: failure.status,
    url: failure.url,
    body: failure.body,
  };
}
