import {
  DynamicModule,
  FactoryProvider,
  Module,
  ModuleMetadata,
} from '@nestjs/common';
import { RedditListingClient } from './reddit-listing.client';
import { RedditListingParser } from './reddit-listing.parser';
import {
  REDDIT_LISTING_OPTIONS,
  RedditListingOptions,
} from './interfaces/reddit-config.interface';

export interface RedditListingModuleAsyncOptions
  extends Pick<ModuleMetadata, 'imports'>,
    Pick<FactoryProvider<RedditListingOptions>, 'inject' | 'useFactory'> {}

/**
 * Reddit Listing Module
 * Provides a single RedditListingClient, so every consumer in the
 * application shares one transport
 *
 * Architecture:
 * - RedditListingClient: Builds listing requests and maps failures to typed errors
 * - RedditListingParser: Validates listing bodies and maps them to posts
 */
@Module({})
export class RedditListingModule {
  static forRoot(options: RedditListingOptions = {}): DynamicModule {
    return {
      module: RedditListingModule,
      providers: [
        { provide: REDDIT_LISTING_OPTIONS, useValue: options },
        RedditListingParser,
        RedditListingClient,
      ],
      exports: [RedditListingClient],
    };
  }

  static forRootAsync(options: RedditListingModuleAsyncOptions): DynamicModule {
    return {
      module: RedditListingModule,
      imports: options.imports ?? [],
      providers: [
        {
          provide: REDDIT_LISTING_OPTIONS,
          inject: options.inject ?? [],
          useFactory: options.useFactory,
        },
        RedditListingParser,
        RedditListingClient,
      ],
      exports: [RedditListingClient],
    };
  }
}
