import 'reflect-metadata';

export { RedditListingClient } from './platforms/reddit/reddit-listing.client';
export { RedditListingParser } from './platforms/reddit/reddit-listing.parser';
export { RedditListingModule } from './platforms/reddit/reddit-listing.module';
export type { RedditListingModuleAsyncOptions } from './platforms/reddit/reddit-listing.module';
export {
  ApiError,
  DeserializationError,
  InvalidRequestError,
  RedditClientError,
  RedditClientErrorKind,
  SubredditNotFoundError,
  TransportError,
  isRedditClientError,
} from './platforms/reddit/reddit-listing.errors';
export { toLinkWire, toRedditPost } from './platforms/reddit/reddit-post.mapper';
export { buildUserAgent, DEFAULT_USER_AGENT_PARTS } from './platforms/reddit/user-agent';
export * from './platforms/reddit/interfaces';
export { getRedditListingConfig } from './config/reddit.config';
