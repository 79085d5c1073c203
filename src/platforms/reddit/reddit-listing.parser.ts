import { Injectable, Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { LinkDataDto, ListingEnvelopeDto } from './dto/reddit-listing.dto';
import {
  REDDIT_LINK_KIND,
  RedditPost,
  Subreddit,
} from './interfaces/reddit-listing.interface';
import { DeserializationError } from './reddit-listing.errors';
import { toRedditPost } from './reddit-post.mapper';
import { getErrorMessage, truncateForLog } from '../../common/utils/error.utils';

interface FieldViolation {
  path: string;
  messages: string[];
}

function joinPath(parent: string | undefined, property: string): string {
  if (parent === undefined) {
    return property;
  }
  return /^\d+$/.test(property)
    ? `${parent}[${property}]`
    : `${parent}.${property}`;
}

function collectViolations(
  errors: ValidationError[],
  parent?: string,
): FieldViolation[] {
  return errors.flatMap((error) => {
    const path = joinPath(parent, error.property);
    const own = error.constraints
      ? [{ path, messages: Object.values(error.constraints) }]
      : [];
    return [...own, ...collectViolations(error.children ?? [], path)];
  });
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reddit Listing Parser
 * Turns a listing response body into a Subreddit, or throws DeserializationError
 * naming the first field that does not match the expected shape
 */
@Injectable()
export class RedditListingParser {
  private readonly logger = new Logger(RedditListingParser.name);

  /**
   * @param body - Raw response body
   * @param subreddit - Name as requested, carried into the result
   * @param limit - Maximum number of posts to keep
   */
  parse(body: string, subreddit: string, limit: number): Subreddit {
    const envelope = this.validate(
      ListingEnvelopeDto,
      this.parseJson(body),
      body,
    );

    const posts: RedditPost[] = [];

    envelope.data.children.forEach((child, index) => {
      if (!isPlainObject(child)) {
        throw new DeserializationError(
          `Expected an object at data.children[${index}]`,
          { body, path: `data.children[${index}]` },
        );
      }

      if (child.kind !== REDDIT_LINK_KIND) {
        this.logger.warn(
          `Skipping r/${subreddit} listing child ${index} of kind "${child.kind}"`,
        );
        return;
      }

      const link = this.validate(
        LinkDataDto,
        child.data,
        body,
        `data.children[${index}].data`,
      );
      posts.push(toRedditPost(link));
    });

    if (posts.length > limit) {
      this.logger.warn(
        `r/${subreddit} returned ${posts.length} posts for limit ${limit}, keeping the first ${limit}`,
      );
    }

    return Object.freeze({
      name: subreddit,
      posts: Object.freeze(posts.slice(0, limit)),
      after: envelope.data.after ?? undefined,
      before: envelope.data.before ?? undefined,
    });
  }

  private parseJson(body: string): unknown {
    try {
      return JSON.parse(body);
    } catch (error) {
      throw new DeserializationError(
        `Response body is not valid JSON (${getErrorMessage(error)}): ${truncateForLog(body)}`,
        { body, cause: error },
      );
    }
  }

  private validate<T extends object>(
    dto: new () => T,
    plain: unknown,
    body: string,
    prefix?: string,
  ): T {
    if (!isPlainObject(plain)) {
      throw new DeserializationError(
        `Expected an object at ${prefix ?? 'the top level'}`,
        { body, path: prefix },
      );
    }

    const instance = plainToInstance(dto, plain);
    const [first] = collectViolations(validateSync(instance), prefix);

    if (first) {
      throw new DeserializationError(
        `Unexpected listing shape at ${first.path}: ${first.messages.join(', ')}`,
        { body, path: first.path },
      );
    }

    return instance;
  }
}
