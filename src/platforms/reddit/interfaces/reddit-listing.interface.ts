/**
 * Reddit Listing Domain Interfaces
 * Immutable values handed back to callers of the listing client
 */

/**
 * Maximum number of items the listing endpoint returns per request
 * Larger limits are clamped by the server, not rejected
 */
export const REDDIT_LISTING_MAX_LIMIT = 100;

/**
 * Thing kind of a link (post)
 */
export const REDDIT_LINK_KIND = 't3';

/**
 * Hint about what a post contains
 */
export enum PostHint {
  IMAGE = 'image',
  LINK = 'link',
  HOSTED_VIDEO = 'hosted:video',
  RICH_VIDEO = 'rich:video',
  SELF = 'self',
  GALLERY = 'gallery',
}

export interface RedditPost {
  /**
   * Short ID without prefix (e.g., "abc123")
   */
  readonly id: string;

  /**
   * Fullname with type prefix (e.g., "t3_abc123")
   */
  readonly fullname: string;

  /**
   * May contain newlines
   */
  readonly title: string;

  /**
   * Account name of the poster ("[deleted]" for removed accounts)
   */
  readonly author: string;

  /**
   * Subreddit without the r/ prefix
   */
  readonly subreddit: string;

  /**
   * Net score (upvotes minus downvotes, fuzzed by Reddit)
   */
  readonly score: number;

  readonly ups: number;
  readonly upvoteRatio?: number;
  readonly numComments: number;

  /**
   * Creation time in UTC epoch seconds
   */
  readonly createdUtc: number;

  /**
   * Relative URL of the comments page (e.g., "/r/pics/comments/abc123/title/")
   */
  readonly permalink: string;

  /**
   * Link target; the permalink for self posts
   */
  readonly url: string;

  /**
   * "self.<subreddit>" for self posts
   */
  readonly domain?: string;

  readonly isSelf: boolean;

  /**
   * Raw markdown body; empty for link posts
   */
  readonly selftext: string;

  /**
   * Escaped HTML body
   */
  readonly selftextHtml?: string;

  /**
   * Thumbnail URL, or one of "self", "default", "image", "nsfw", "spoiler"
   */
  readonly thumbnail?: string;

  readonly postHint?: PostHint;
  readonly over18: boolean;
  readonly spoiler: boolean;
  readonly stickied: boolean;
  readonly locked: boolean;
  readonly isVideo: boolean;
  readonly linkFlairText?: string;
  readonly authorFlairText?: string;

  /**
   * "moderator", "admin" or "special"
   */
  readonly distinguished?: string;

  readonly edited: boolean;

  /**
   * Edit time in UTC epoch seconds; old edited posts only report edited: true
   */
  readonly editedUtc?: number;
}

/**
 * Result of a single listing fetch
 */
export interface Subreddit {
  /**
   * Name as requested by the caller
   */
  readonly name: string;

  /**
   * Posts in the order the API returned them
   */
  readonly posts: readonly RedditPost[];

  /**
   * Fullname of the last item, when a next page exists
   */
  readonly after?: string;

  readonly before?: string;
}

/**
 * Wire (snake_case) fields of a link, as produced by toLinkWire
 */
export interface RedditLinkWire {
  id: string;
  name: string;
  title: string;
  author: string;
  subreddit: string;
  score: number;
  ups: number;
  upvote_ratio?: number;
  num_comments: number;
  created_utc: number;
  permalink: string;
  url: string;
  domain?: string;
  is_self: boolean;
  selftext: string;
  selftext_html?: string;
  thumbnail?: string;
  post_hint?: string;
  over_18: boolean;
  spoiler: boolean;
  stickied: boolean;
  locked: boolean;
  is_video: boolean;
  link_flair_text?: string;
  author_flair_text?: string;
  distinguished?: string;
  edited: boolean | number;
}
