/**
 * Reddit Listing Client Configuration
 * Options accepted by the client and the shape they resolve to
 */

/**
 * Default public API host
 */
export const REDDIT_DEFAULT_BASE_URL = 'https://www.reddit.com';

/**
 * Injection token for {@link RedditListingOptions}
 */
export const REDDIT_LISTING_OPTIONS = Symbol('REDDIT_LISTING_OPTIONS');

/**
 * Version reported in the default user agent
 */
export const REDDIT_LISTING_CLIENT_VERSION = '0.1.0';

/**
 * Minimal view of an HTTP response the client reads
 * The global fetch Response satisfies it
 */
export interface TransportResponse {
  readonly ok: boolean;
  readonly status: number;
  readonly statusText: string;

  /**
   * Final URL after redirects
   */
  readonly url: string;

  text(): Promise<string>;
}

export interface TransportRequestInit {
  method: 'GET';
  headers: Record<string, string>;
  signal?: AbortSignal;
}

/**
 * HTTP transport used for every request
 * Defaults to the global fetch, whose dispatcher pools connections
 */
export type HttpTransport = (
  url: string,
  init: TransportRequestInit,
) => Promise<TransportResponse>;

/**
 * Pieces of the user agent Reddit asks API consumers to send
 * Format: <platform>:<app ID>:v<version> (by /u/<reddit username>)
 */
export interface UserAgentParts {
  /**
   * Example: "node", "linux", "android"
   */
  platform: string;

  /**
   * Example: "com.example.listings"
   */
  appId: string;

  /**
   * Without the leading "v". Example: "1.2.0"
   */
  appVersion: string;

  /**
   * Without the "/u/" prefix
   */
  username: string;
}

export interface RedditListingOptions {
  /**
   * API host, default https://www.reddit.com
   */
  baseUrl?: string;

  /**
   * Full user agent string
   * Takes precedence over userAgentParts
   */
  userAgent?: string;

  userAgentParts?: Partial<UserAgentParts>;

  /**
   * Per-request timeout in milliseconds
   */
  timeoutMs?: number;

  transport?: HttpTransport;
}

export interface RedditListingConfig {
  readonly baseUrl: string;
  readonly userAgent: string;
  readonly timeoutMs?: number;
  readonly transport: HttpTransport;
}

/**
 * Per-call options for getSubreddit
 */
export interface GetSubredditOptions {
  /**
   * Aborting abandons the in-flight request
   */
  signal?: AbortSignal;
}
