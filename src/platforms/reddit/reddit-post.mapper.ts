import { LinkDataDto } from './dto/reddit-listing.dto';
import {
  PostHint,
  RedditLinkWire,
  RedditPost,
} from './interfaces/reddit-listing.interface';

const POST_HINTS = new Set<string>(Object.values(PostHint));

function isPostHint(value: string): value is PostHint {
  return POST_HINTS.has(value);
}

function presentString(value: string | null | undefined): string | undefined {
  return value ? value : undefined;
}

/**
 * Map a validated t3 payload onto a frozen RedditPost
 * Optional wire fields fall back to the defaults documented on RedditPost
 */
export function toRedditPost(link: LinkDataDto): RedditPost {
  const postHint =
    link.post_hint && isPostHint(link.post_hint) ? link.post_hint : undefined;

  const post: RedditPost = {
    id: link.id,
    fullname: link.name,
    title: link.title,
    author: link.author,
    subreddit: link.subreddit,
    score: link.score,
    ups: link.ups ?? link.score,
    upvoteRatio: link.upvote_ratio,
    numComments: link.num_comments ?? 0,
    createdUtc: link.created_utc,
    permalink: link.permalink,
    url: link.url,
    domain: presentString(link.domain),
    isSelf: link.is_self ?? false,
    selftext: link.selftext ?? '',
    selftextHtml: presentString(link.selftext_html),
    thumbnail: presentString(link.thumbnail),
    postHint,
    over18: link.over_18 ?? false,
    spoiler: link.spoiler ?? false,
    stickied: link.stickied ?? false,
    locked: link.locked ?? false,
    isVideo: link.is_video ?? false,
    linkFlairText: presentString(link.link_flair_text),
    authorFlairText: presentString(link.author_flair_text),
    distinguished: presentString(link.distinguished),
    edited: typeof link.edited === 'number' || link.edited === true,
    editedUtc: typeof link.edited === 'number' ? link.edited : undefined,
  };

  return Object.freeze(post);
}

/**
 * Serialize a post back to Reddit's snake_case field names
 * Absent optional fields are omitted
 */
export function toLinkWire(post: RedditPost): RedditLinkWire {
  const wire: RedditLinkWire = {
    id: post.id,
    name: post.fullname,
    title: post.title,
    author: post.author,
    subreddit: post.subreddit,
    score: post.score,
    ups: post.ups,
    num_comments: post.numComments,
    created_utc: post.createdUtc,
    permalink: post.permalink,
    url: post.url,
    is_self: post.isSelf,
    selftext: post.selftext,
    over_18: post.over18,
    spoiler: post.spoiler,
    stickied: post.stickied,
    locked: post.locked,
    is_video: post.isVideo,
    edited: post.editedUtc ?? post.edited,
  };

  if (post.upvoteRatio !== undefined) wire.upvote_ratio = post.upvoteRatio;
  if (post.domain !== undefined) wire.domain = post.domain;
  if (post.selftextHtml !== undefined) wire.selftext_html = post.selftextHtml;
  if (post.thumbnail !== undefined) wire.thumbnail = post.thumbnail;
  if (post.postHint !== undefined) wire.post_hint = post.postHint;
  if (post.linkFlairText !== undefined) {
    wire.link_flair_text = post.linkFlairText;
  }
  if (post.authorFlairText !== undefined) {
    wire.author_flair_text = post.authorFlairText;
  }
  if (post.distinguished !== undefined) {
    wire.distinguished = post.distinguished;
  }

  return wire;
}
