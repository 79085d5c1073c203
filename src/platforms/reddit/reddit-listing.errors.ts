/**
 * Failure categories surfaced by the listing client
 */
export enum RedditClientErrorKind {
  TRANSPORT = 'transport',
  DESERIALIZATION = 'deserialization',
  API = 'api',
  INVALID_REQUEST = 'invalid_request',
}

/**
 * Base class of every error thrown by getSubreddit
 * Branch on `kind` (or instanceof) to handle a failure category
 */
export abstract class RedditClientError extends Error {
  abstract readonly kind: RedditClientErrorKind;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The request could not be completed (DNS, connect, TLS, timeout, abort)
 */
export class TransportError extends RedditClientError {
  readonly kind = RedditClientErrorKind.TRANSPORT;
  readonly url: string;

  /**
   * true when the caller's signal or the configured timeout ended the request
   */
  readonly aborted: boolean;

  constructor(
    message: string,
    details: { url: string; aborted?: boolean; cause?: unknown },
  ) {
    super(message, { cause: details.cause });
    this.url = details.url;
    this.aborted = details.aborted ?? false;
  }
}

/**
 * The response body does not match the listing shape
 */
export class DeserializationError extends RedditClientError {
  readonly kind = RedditClientErrorKind.DESERIALIZATION;

  /**
   * Path of the first offending field, e.g. "data.children[2].data.title"
   * Undefined when the body is not JSON at all
   */
  readonly path?: string;

  /**
   * Raw response body
   */
  readonly body: string;

  constructor(
    message: string,
    details: { body: string; path?: string; cause?: unknown },
  ) {
    super(message, { cause: details.cause });
    this.body = details.body;
    this.path = details.path;
  }
}

/**
 * Reddit answered with a non-success status
 */
export class ApiError extends RedditClientError {
  readonly kind = RedditClientErrorKind.API;
  readonly status: number;
  readonly url: string;

  /**
   * Reddit's reason code, e.g. "private", "banned", "quarantined"
   */
  readonly reason?: string;

  constructor(
    status: number,
    message: string,
    details: { url: string; reason?: string },
  ) {
    super(message);
    this.status = status;
    this.url = details.url;
    this.reason = details.reason;
  }
}

/**
 * Reddit redirected the listing request to subreddit search
 */
export class SubredditNotFoundError extends ApiError {
  readonly subreddit: string;

  constructor(subreddit: string, url: string) {
    super(404, `Subreddit r/${subreddit} could not be found`, {
      url,
      reason: 'not_found',
    });
    this.subreddit = subreddit;
  }
}

/**
 * Arguments rejected before any request was sent
 */
export class InvalidRequestError extends RedditClientError {
  readonly kind = RedditClientErrorKind.INVALID_REQUEST;

  constructor(message: string) {
    super(message);
  }
}

export function isRedditClientError(
  error: unknown,
): error is RedditClientError {
  return error instanceof RedditClientError;
}
