export * from './reddit-config.interface';
export * from './reddit-listing.interface';
