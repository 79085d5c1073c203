import { readFileSync } from 'fs';
import { join } from 'path';
import { Logger } from '@nestjs/common';
import { RedditListingParser } from './reddit-listing.parser';
import { DeserializationError } from './reddit-listing.errors';
import { toLinkWire } from './reddit-post.mapper';
import { PostHint } from './interfaces';

const LISTING_FIXTURE = readFileSync(
  join(__dirname, '__fixtures__', 'subreddit-listing.json'),
  'utf8',
);

const link = (overrides: Record<string, unknown> = {}) => ({
  id: 'abc',
  name: 't3_abc',
  title: 't',
  author: 'a',
  subreddit: 'testsub',
  score: 5,
  created_utc: 1700000000,
  permalink: '/r/testsub/comments/abc/t/',
  url: 'https://example.com/abc',
  ...overrides,
});

const listing = (children: unknown[]) =>
  JSON.stringify({ kind: 'Listing', data: { after: null, children } });

function captureDeserializationError(fn: () => unknown): DeserializationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof DeserializationError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a DeserializationError');
}

describe('RedditListingParser', () => {
  let parser: RedditListingParser;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    parser = new RedditListingParser();
    warnSpy = jest.spyOn(Logger.prototype, 'warn').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('well-formed listings', () => {
    it('should keep posts in response order', () => {
      const result = parser.parse(LISTING_FIXTURE, 'testsub', 25);

      expect(result.name).toBe('testsub');
      expect(result.posts.map((post) => post.id)).toEqual([
        'post001',
        'post002',
        'post003',
      ]);
      expect(result.after).toBe('t3_post003');
      expect(result.before).toBeUndefined();
    });

    it('should map every documented field of a full post', () => {
      const [first] = parser.parse(LISTING_FIXTURE, 'testsub', 25).posts;

      expect(first).toEqual({
        id: 'post001',
        fullname: 't3_post001',
        title: 'Weekly discussion thread',
        author: 'AutoModerator',
        subreddit: 'testsub',
        score: 42,
        ups: 42,
        upvoteRatio: 0.95,
        numComments: 17,
        createdUtc: 1700000000,
        permalink: '/r/testsub/comments/post001/weekly_discussion_thread/',
        url: 'https://www.reddit.com/r/testsub/comments/post001/weekly_discussion_thread/',
        domain: 'self.testsub',
        isSelf: true,
        selftext: 'Talk about **anything**.',
        selftextHtml:
          '&lt;p&gt;Talk about &lt;strong&gt;anything&lt;/strong&gt;.&lt;/p&gt;',
        thumbnail: 'self',
        postHint: PostHint.SELF,
        over18: false,
        spoiler: false,
        stickied: true,
        locked: false,
        isVideo: false,
        linkFlairText: 'Discussion',
        authorFlairText: undefined,
        distinguished: 'moderator',
        edited: false,
        editedUtc: undefined,
      });
    });

    it('should record the edit time when edited is a timestamp', () => {
      const second = parser.parse(LISTING_FIXTURE, 'testsub', 25).posts[1];

      expect(second.edited).toBe(true);
      expect(second.editedUtc).toBe(1700007200);
      expect(second.postHint).toBe(PostHint.IMAGE);
      expect(second.selftextHtml).toBeUndefined();
      expect(second.authorFlairText).toBe('Cat person');
    });

    it('should apply defaults for absent optional fields', () => {
      const third = parser.parse(LISTING_FIXTURE, 'testsub', 25).posts[2];

      expect(third).toMatchObject({
        author: '[deleted]',
        score: -3,
        ups: -3,
        numComments: 0,
        isSelf: false,
        selftext: '',
        over18: false,
        spoiler: false,
        stickied: false,
        locked: false,
        isVideo: false,
        edited: true,
      });
      expect(third.upvoteRatio).toBeUndefined();
      expect(third.domain).toBeUndefined();
      expect(third.editedUtc).toBeUndefined();
    });

    it('should drop empty thumbnails and unknown post hints', () => {
      const third = parser.parse(LISTING_FIXTURE, 'testsub', 25).posts[2];

      expect(third.thumbnail).toBeUndefined();
      expect(third.postHint).toBeUndefined();
    });

    it('should return frozen values', () => {
      const result = parser.parse(LISTING_FIXTURE, 'testsub', 25);

      expect(Object.isFrozen(result)).toBe(true);
      expect(Object.isFrozen(result.posts)).toBe(true);
      expect(Object.isFrozen(result.posts[0])).toBe(true);
    });

    it('should return an empty post list for an empty listing', () => {
      const result = parser.parse(listing([]), 'quiet', 10);

      expect(result.posts).toEqual([]);
      expect(result.after).toBeUndefined();
    });
  });

  describe('limit', () => {
    it('should keep only the first `limit` posts', () => {
      const result = parser.parse(LISTING_FIXTURE, 'testsub', 2);

      expect(result.posts.map((post) => post.id)).toEqual([
        'post001',
        'post002',
      ]);
      expect(warnSpy).toHaveBeenCalledWith(
        'r/testsub returned 3 posts for limit 2, keeping the first 2',
      );
    });
  });

  describe('non-link children', () => {
    it('should skip children that are not t3', () => {
      const body = listing([
        { kind: 't3', data: link() },
        { kind: 'more', data: { children: ['def'] } },
      ]);

      const result = parser.parse(body, 'testsub', 10);

      expect(result.posts.map((post) => post.id)).toEqual(['abc']);
      expect(warnSpy).toHaveBeenCalledWith(
        'Skipping r/testsub listing child 1 of kind "more"',
      );
    });
  });

  describe('malformed bodies', () => {
    it('should reject a body that is not JSON', () => {
      const error = captureDeserializationError(() =>
        parser.parse('<html><body>Too Many Requests</body></html>', 'testsub', 10),
      );

      expect(error.path).toBeUndefined();
      expect(error.body).toBe('<html><body>Too Many Requests</body></html>');
      expect(error.message).toContain('Response body is not valid JSON');
    });

    it('should reject a top-level array', () => {
      const error = captureDeserializationError(() =>
        parser.parse('[]', 'testsub', 10),
      );

      expect(error.path).toBeUndefined();
      expect(error.message).toBe('Expected an object at the top level');
    });

    it('should reject an envelope of the wrong kind', () => {
      const error = captureDeserializationError(() =>
        parser.parse(
          JSON.stringify({ kind: 't3', data: { children: [] } }),
          'testsub',
          10,
        ),
      );

      expect(error.path).toBe('kind');
    });

    it('should reject a listing without data', () => {
      const error = captureDeserializationError(() =>
        parser.parse(JSON.stringify({ kind: 'Listing' }), 'testsub', 10),
      );

      expect(error.path).toBe('data');
    });

    it('should reject a listing without data.children', () => {
      const error = captureDeserializationError(() =>
        parser.parse(
          JSON.stringify({ kind: 'Listing', data: { after: null } }),
          'testsub',
          10,
        ),
      );

      expect(error.path).toBe('data.children');
    });

    it('should reject a child whose data is not an object', () => {
      const error = captureDeserializationError(() =>
        parser.parse(listing([{ kind: 't3', data: 'abc' }]), 'testsub', 10),
      );

      expect(error.path).toBe('data.children[0].data');
    });

    it('should reject a child that is an array', () => {
      const body = '{"kind":"Listing","data":{"children":[[]]}}';

      const error = captureDeserializationError(() =>
        parser.parse(body, 'testsub', 10),
      );

      expect(error.path).toBe('data.children[0]');
      expect(error.message).toBe('Expected an object at data.children[0]');
      expect(warnSpy).not.toHaveBeenCalled();
    });

    it('should name the missing required field of a post', () => {
      const { title, ...untitled } = link();
      const error = captureDeserializationError(() =>
        parser.parse(
          listing([
            { kind: 't3', data: link() },
            { kind: 't3', data: untitled },
          ]),
          'testsub',
          10,
        ),
      );

      expect(title).toBe('t');
      expect(error.path).toBe('data.children[1].data.title');
    });

    it('should reject a known field with the wrong type', () => {
      const error = captureDeserializationError(() =>
        parser.parse(
          listing([{ kind: 't3', data: link({ score: '5' }) }]),
          'testsub',
          10,
        ),
      );

      expect(error.path).toBe('data.children[0].data.score');
    });

    it('should reject an edited marker that is neither boolean nor number', () => {
      const error = captureDeserializationError(() =>
        parser.parse(
          listing([{ kind: 't3', data: link({ edited: 'yesterday' }) }]),
          'testsub',
          10,
        ),
      );

      expect(error.path).toBe('data.children[0].data.edited');
    });

    it('should ignore unknown fields', () => {
      const result = parser.parse(
        listing([{ kind: 't3', data: link({ gildings: {}, wls: 6 }) }]),
        'testsub',
        10,
      );

      expect(result.posts).toHaveLength(1);
    });
  });

  describe('serialization', () => {
    it('should parse its own wire output back to an equal post', () => {
      const [post] = parser.parse(listing([{ kind: 't3', data: link() }]), 'testsub', 1).posts;

      const wire = toLinkWire(post);
      const [reparsed] = parser.parse(
        listing([{ kind: 't3', data: wire }]),
        'testsub',
        1,
      ).posts;

      expect(wire).toMatchObject({
        id: 'abc',
        title: 't',
        author: 'a',
        score: 5,
      });
      expect(reparsed).toEqual(post);
    });

    it('should round-trip a fully populated post', () => {
      const posts = parser.parse(LISTING_FIXTURE, 'testsub', 25).posts;
      const body = listing(
        posts.map((post) => ({ kind: 't3', data: toLinkWire(post) })),
      );

      expect(parser.parse(body, 'testsub', 25).posts).toEqual(posts);
    });
  });
});
