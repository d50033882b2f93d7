import { describe, expect, it, vi } from 'vitest';
import type { Logger } from '../../obs/logger';
import { createArticlePresenterFactory } from '../../presenters/articlePresenter';
import { handlePresentArticles } from '../presentArticles';

const createLoggerStub = (): Logger => {
  const logger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
};

const createPresenter = createArticlePresenterFactory({
  appDomain: 'blog.test',
  transformVideoUrl: (url) => url ?? '',
});

const snapshot = (overrides: Record<string, unknown> = {}) => ({
  id: 7,
  title: 'Hello world',
  bodyMarkdown: '---\ndescription:\ntags: intro\n---\n\nFirst post here',
  slug: 'hello-world-1a',
  username: 'jdoe',
  authorName: 'Jane Doe',
  published: true,
  cachedTagList: 'intro, discuss',
  publishedAt: '2026-02-08T00:00:00.000Z',
  path: '/jdoe/hello-world-1a',
  ...overrides,
});

describe('handlePresentArticles', () => {
  it('presents a single article', () => {
    const result = handlePresentArticles({
      body: {
        article: snapshot(),
        only: ['id'],
        methods: ['publishedAtInt', 'commentsToShowCount', 'descriptionAndTags', 'url'],
      },
      createPresenter,
      logger: createLoggerStub(),
    });

    expect(result).toEqual({
      status: 200,
      payload: {
        article: {
          id: 7,
          publishedAtInt: 1770508800,
          commentsToShowCount: 75,
          descriptionAndTags: 'First post here. Tagged with intro.',
          url: 'https://blog.test/jdoe/hello-world-1a',
        },
      },
    });
  });

  it('presents a list in order with a placement', () => {
    const result = handlePresentArticles({
      body: {
        articles: [snapshot({ id: 1 }), snapshot({ id: 2, organization: { slug: 'acme' }, boostedAdditionalArticles: true })],
        only: ['id'],
        methods: ['internalUtmParams'],
        placement: 'homepage',
      },
      createPresenter,
      logger: createLoggerStub(),
    });

    expect(result.status).toBe(200);
    expect(result.payload).toEqual({
      articles: [
        { id: 1, internalUtmParams: '?utm_source=homepage&utm_medium=internal&utm_campaign=regular&booster_org=' },
        {
          id: 2,
          internalUtmParams: '?utm_source=homepage&utm_medium=internal&utm_campaign=acme_boosted&booster_org=acme',
        },
      ],
    });
  });

  it('rejects a body with both article and articles', () => {
    const logger = createLoggerStub();
    const result = handlePresentArticles({
      body: { article: snapshot(), articles: [snapshot()] },
      createPresenter,
      logger,
    });

    expect(result.status).toBe(400);
    expect(result.payload.error).toBe('Invalid request body');
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('rejects malformed snapshots', () => {
    const result = handlePresentArticles({
      body: { article: snapshot({ path: 'no-leading-slash' }) },
      createPresenter,
      logger: createLoggerStub(),
    });

    expect(result.status).toBe(400);
    expect(result.payload.issues).toEqual([{ path: 'article.path', message: 'path must start with "/"' }]);
  });

  it('rejects a snapshot without an author name', () => {
    const result = handlePresentArticles({
      body: { article: snapshot({ authorName: '   ' }) },
      createPresenter,
      logger: createLoggerStub(),
    });

    expect(result.status).toBe(400);
    expect(result.payload.issues).toEqual([{ path: 'article.authorName', message: 'authorName is required' }]);
  });

  it('reports unknown methods as a bad request', () => {
    const result = handlePresentArticles({
      body: { article: snapshot(), only: [], methods: ['password'] },
      createPresenter,
      logger: createLoggerStub(),
    });

    expect(result).toEqual({
      status: 400,
      payload: { error: 'Unknown presenter method "password"', code: 'unknown_method' },
    });
  });

  it('reports a missing publication date as unprocessable', () => {
    const result = handlePresentArticles({
      body: { article: snapshot({ publishedAt: null, published: false, password: 'draft-token' }), methods: ['publishedAtInt'], only: [] },
      createPresenter,
      logger: createLoggerStub(),
    });

    expect(result).toEqual({
      status: 422,
      payload: { error: 'Article 7 has no publishedAt timestamp', code: 'missing_published_at' },
    });
  });
});
