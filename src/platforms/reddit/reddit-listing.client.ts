import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import {
  GetSubredditOptions,
  REDDIT_DEFAULT_BASE_URL,
  REDDIT_LISTING_OPTIONS,
  RedditListingConfig,
  RedditListingOptions,
  TransportResponse,
} from './interfaces/reddit-config.interface';
import {
  REDDIT_LISTING_MAX_LIMIT,
  Subreddit,
} from './interfaces/reddit-listing.interface';
import { ApiErrorBodyDto } from './dto/reddit-listing.dto';
import {
  ApiError,
  InvalidRequestError,
  SubredditNotFoundError,
  TransportError,
} from './reddit-listing.errors';
import { RedditListingParser } from './reddit-listing.parser';
import { buildUserAgent } from './user-agent';
import {
  getErrorMessage,
  getErrorStack,
  getRootCauseMessage,
  truncateForLog,
} from '../../common/utils/error.utils';

// Reddit answers an unknown subreddit with a redirect to search
const SUBREDDIT_SEARCH_PATH = '/subreddits/search.json';

/**
 * Reddit Listing Client
 * Reads public subreddit listings anonymously, one request per call.
 * The transport is shared by every call the client makes; nothing else is
 * shared between calls, so concurrent calls are independent.
 */
@Injectable()
export class RedditListingClient {
  private readonly logger = new Logger(RedditListingClient.name);
  private readonly config: RedditListingConfig;

  constructor(
    @Optional()
    @Inject(REDDIT_LISTING_OPTIONS)
    options: RedditListingOptions | null = null,
    @Optional()
    private readonly parser: RedditListingParser = new RedditListingParser(),
  ) {
    this.config = this.loadConfig(options ?? {});
  }

  /**
   * Resolve options against defaults and freeze the result
   */
  private loadConfig(options: RedditListingOptions): RedditListingConfig {
    const baseUrl = (options.baseUrl ?? REDDIT_DEFAULT_BASE_URL).replace(
      /\/+$/,
      '',
    );

    let protocol: string;
    try {
      protocol = new URL(baseUrl).protocol;
    } catch (error) {
      throw new Error(`Invalid Reddit base URL "${baseUrl}"`, { cause: error });
    }
    if (protocol !== 'https:' && protocol !== 'http:') {
      throw new Error(
        `Reddit base URL must use http or https, got "${protocol}"`,
      );
    }

    if (
      options.timeoutMs !== undefined &&
      (!Number.isInteger(options.timeoutMs) || options.timeoutMs <= 0)
    ) {
      throw new Error(
        `Reddit request timeout must be a positive integer, got ${options.timeoutMs}`,
      );
    }

    const userAgent =
      options.userAgent?.trim() || buildUserAgent(options.userAgentParts);

    const config: RedditListingConfig = {
      baseUrl,
      userAgent,
      timeoutMs: options.timeoutMs,
      transport: options.transport ?? ((url, init) => fetch(url, init)),
    };

    return Object.freeze(config);
  }

  /**
   * Fetch up to `limit` posts from a subreddit's listing
   * @param name - Subreddit name without the r/ prefix
   * @param limit - Maximum number of posts; Reddit clamps values above REDDIT_LISTING_MAX_LIMIT
   * @throws InvalidRequestError, TransportError, ApiError, DeserializationError
   */
  async getSubreddit(
    name: string,
    limit: number,
    options: GetSubredditOptions = {},
  ): Promise<Subreddit> {
    this.assertArguments(name, limit);

    const url = this.buildListingUrl(name, limit);

    try {
      this.logger.log(`Fetching r/${name} (limit ${limit})`);
      if (limit > REDDIT_LISTING_MAX_LIMIT) {
        this.logger.debug(
          `Limit ${limit} exceeds the listing maximum of ${REDDIT_LISTING_MAX_LIMIT}; Reddit will return at most ${REDDIT_LISTING_MAX_LIMIT} posts`,
        );
      }

      const { response, body } = await this.send(url, options.signal);

      if (this.isSearchRedirect(response)) {
        throw new SubredditNotFoundError(name, url);
      }

      if (!response.ok) {
        throw this.toApiError(response, body, url);
      }

      const subreddit = this.parser.parse(body, name, limit);

      this.logger.log(
        `Fetched ${subreddit.posts.length} posts from r/${name}`,
      );

      return subreddit;
    } catch (error) {
      this.logger.error(
        `Failed to fetch r/${name}: ${getErrorMessage(error)}`,
        getErrorStack(error),
      );

      throw error;
    }
  }

  /**
   * Matched on the path alone: the redirect may land on another host
   * (reddit.com → www.reddit.com)
   */
  private isSearchRedirect(response: TransportResponse): boolean {
    if (!response.url) {
      return false;
    }

    try {
      return new URL(response.url).pathname === SUBREDDIT_SEARCH_PATH;
    } catch {
      this.logger.debug(`Unparsable response URL "${response.url}"`);
      return false;
    }
  }

  private assertArguments(name: string, limit: number): void {
    if (typeof name !== 'string' || name.trim() === '') {
      throw new InvalidRequestError('Subreddit name must be a non-empty string');
    }
    if (!Number.isInteger(limit) || limit < 1) {
      throw new InvalidRequestError(
        `Listing limit must be a positive integer, got ${limit}`,
      );
    }
  }

  private buildListingUrl(name: string, limit: number): string {
    const query = new URLSearchParams({ limit: String(limit) });
    return `${this.config.baseUrl}/r/${encodeURIComponent(name.trim())}/.json?${query.toString()}`;
  }

  /**
   * Issue the GET and read the whole body
   * Any failure here is a transport failure
   */
  private async send(
    url: string,
    callerSignal: AbortSignal | undefined,
  ): Promise<{ response: TransportResponse; body: string }> {
    const abort = this.linkAbortSignals(callerSignal);

    try {
      const response = await this.config.transport(url, {
        method: 'GET',
        headers: { 'User-Agent': this.config.userAgent },
        signal: abort.signal,
      });
      const body = await response.text();
      return { response, body };
    } catch (error) {
      const aborted = abort.signal?.aborted ?? false;
      const reason = aborted
        ? abort.timedOut()
          ? `timed out after ${this.config.timeoutMs}ms`
          : 'was aborted'
        : `failed: ${getRootCauseMessage(error)}`;

      throw new TransportError(`Request to ${url} ${reason}`, {
        url,
        aborted,
        cause: error,
      });
    } finally {
      abort.dispose();
    }
  }

  /**
   * Combine the caller's signal with the configured timeout
   */
  private linkAbortSignals(callerSignal: AbortSignal | undefined): {
    signal?: AbortSignal;
    timedOut: () => boolean;
    dispose: () => void;
  } {
    const { timeoutMs } = this.config;

    if (timeoutMs === undefined) {
      return { signal: callerSignal, timedOut: () => false, dispose: () => {} };
    }

    const controller = new AbortController();
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onCallerAbort = () => controller.abort(callerSignal?.reason);

    if (callerSignal?.aborted) {
      onCallerAbort();
    } else {
      callerSignal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    return {
      signal: controller.signal,
      timedOut: () => timedOut,
      dispose: () => {
        clearTimeout(timer);
        callerSignal?.removeEventListener('abort', onCallerAbort);
      },
    };
  }

  /**
   * Reddit error bodies look like {"message": "Forbidden", "reason": "private", "error": 403}
   * Each field is used only if it validates; anything else falls back to the
   * status text
   */
  private toApiError(
    response: TransportResponse,
    body: string,
    url: string,
  ): ApiError {
    const fallback = response.statusText || `HTTP ${response.status}`;
    let message: string | undefined;
    let reason: string | undefined;

    try {
      const parsed: unknown = JSON.parse(body);
      if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
        const details = plainToInstance(ApiErrorBodyDto, parsed);
        const invalid = new Set(
          validateSync(details).map((error) => error.property),
        );
        message = invalid.has('message') ? undefined : details.message;
        reason = invalid.has('reason') ? undefined : details.reason;
      }
    } catch {
      this.logger.debug(
        `Non-JSON error body for ${url}: ${truncateForLog(body)}`,
      );
    }

    return new ApiError(response.status, message || fallback, {
      url,
      reason,
    });
  }
}
