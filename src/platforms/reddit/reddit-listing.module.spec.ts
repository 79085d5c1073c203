import { Logger } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { RedditListingModule } from './reddit-listing.module';
import { RedditListingClient } from './reddit-listing.client';
import { TransportRequestInit, TransportResponse } from './interfaces';
import { getRedditListingConfig } from '../../config/reddit.config';

const EMPTY_LISTING = '{"kind": "Listing", "data": {"children": []}}';

describe('RedditListingModule', () => {
  let transport: jest.Mock<
    Promise<TransportResponse>,
    [string, TransportRequestInit]
  >;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation();

    transport = jest.fn<
      Promise<TransportResponse>,
      [string, TransportRequestInit]
    >(async (url) => ({
      ok: true,
      status: 200,
      statusText: 'OK',
      url,
      text: async () => EMPTY_LISTING,
    }));
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('forRoot', () => {
    it('should provide a client built from the given options', async () => {
      const module = await Test.createTestingModule({
        imports: [
          RedditListingModule.forRoot({
            baseUrl: 'http://reddit.test',
            userAgent: 'node:module-test:v1.0.0 (by /u/testuser)',
            transport,
          }),
        ],
      }).compile();

      const client = module.get(RedditListingClient);
      const subreddit = await client.getSubreddit('testsub', 5);

      expect(subreddit).toEqual({
        name: 'testsub',
        posts: [],
        after: undefined,
        before: undefined,
      });
      expect(transport).toHaveBeenCalledWith(
        'http://reddit.test/r/testsub/.json?limit=5',
        {
          method: 'GET',
          headers: { 'User-Agent': 'node:module-test:v1.0.0 (by /u/testuser)' },
          signal: undefined,
        },
      );
    });

    it('should hand every consumer the same client', async () => {
      const module = await Test.createTestingModule({
        imports: [RedditListingModule.forRoot({ transport })],
      }).compile();

      expect(module.get(RedditListingClient)).toBe(
        module.get(RedditListingClient),
      );
    });
  });

  describe('forRootAsync', () => {
    it('should build options from ConfigService', async () => {
      const module = await Test.createTestingModule({
        imports: [
          ConfigModule.forRoot({
            isGlobal: true,
            ignoreEnvFile: true,
            load: [
              () => ({
                REDDIT_BASE_URL: 'http://config.reddit.test',
                REDDIT_USER_AGENT: 'node:from-config:v2.0.0 (by /u/testuser)',
              }),
            ],
          }),
          RedditListingModule.forRootAsync({
            imports: [ConfigModule],
            inject: [ConfigService],
            useFactory: (configService: ConfigService) => ({
              ...getRedditListingConfig(configService),
              transport,
            }),
          }),
        ],
      }).compile();

      await module.get(RedditListingClient).getSubreddit('testsub', 5);

      expect(transport).toHaveBeenCalledWith(
        'http://config.reddit.test/r/testsub/.json?limit=5',
        expect.objectContaining({
          headers: { 'User-Agent': 'node:from-config:v2.0.0 (by /u/testuser)' },
        }),
      );
    });
  });
});
