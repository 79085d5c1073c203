import {
  REDDIT_LISTING_CLIENT_VERSION,
  UserAgentParts,
} from './interfaces/reddit-config.interface';

export const DEFAULT_USER_AGENT_PARTS: Readonly<UserAgentParts> = {
  platform: 'node',
  appId: 'reddit-listing-client',
  appVersion: REDDIT_LISTING_CLIENT_VERSION,
  // There is no meaningful default account
  username: 'deleted',
};

/**
 * Build a user agent in the format Reddit's API rules ask for
 * See https://github.com/reddit-archive/reddit/wiki/API#rules
 * @returns e.g. "node:reddit-listing-client:v0.1.0 (by /u/deleted)"
 */
export function buildUserAgent(parts: Partial<UserAgentParts> = {}): string {
  const platform = orDefault(parts.platform, DEFAULT_USER_AGENT_PARTS.platform);
  const appId = orDefault(parts.appId, DEFAULT_USER_AGENT_PARTS.appId);
  const version = orDefault(
    parts.appVersion,
    DEFAULT_USER_AGENT_PARTS.appVersion,
  ).replace(/^v/, '');
  const username = orDefault(
    parts.username,
    DEFAULT_USER_AGENT_PARTS.username,
  ).replace(/^\/?u\//, '');

  return `${platform}:${appId}:v${version} (by /u/${username})`;
}

function orDefault(value: string | undefined, fallback: string): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed : fallback;
}
