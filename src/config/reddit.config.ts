import { ConfigService } from '@nestjs/config';
import {
  REDDIT_DEFAULT_BASE_URL,
  RedditListingOptions,
} from '../platforms/reddit/interfaces/reddit-config.interface';

/**
 * Reads listing client options from the environment
 * Use as the factory of RedditListingModule.forRootAsync
 */
export const getRedditListingConfig = (
  configService: ConfigService,
): RedditListingOptions => {
  const timeout = configService.get<string>('REDDIT_TIMEOUT_MS');

  return {
    baseUrl: configService.get<string>('REDDIT_BASE_URL', REDDIT_DEFAULT_BASE_URL),
    userAgent: configService.get<string>('REDDIT_USER_AGENT'),
    timeoutMs: timeout ? Number(timeout) : undefined,
  };
};
