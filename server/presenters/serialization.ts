import type { Article, ArticleField } from '../../shared/articles';
import type { ArticlePresenter } from './articlePresenter';
import { ArticlePresentationError } from './errors';

type PresenterMethod = (presenter: ArticlePresenter, placement?: string) => unknown;

const presenterMethods = {
  currentStatePath: (presenter: ArticlePresenter) => presenter.currentStatePath(),
  url: (presenter: ArticlePresenter) => presenter.url(),
  processedCanonicalUrl: (presenter: ArticlePresenter) => presenter.processedCanonicalUrl(),
  descriptionAndTags: (presenter: ArticlePresenter) => presenter.descriptionAndTags(),
  cachedTagListArray: (presenter: ArticlePresenter) => presenter.cachedTagListArray(),
  commentsToShowCount: (presenter: ArticlePresenter) => presenter.commentsToShowCount(),
  titleLengthClassification: (presenter: ArticlePresenter) => presenter.titleLengthClassification(),
  internalUtmParams: (presenter: ArticlePresenter, placement?: string) => presenter.internalUtmParams(placement),
  videoMetadata: (presenter: ArticlePresenter) => presenter.videoMetadata(),
  publishedAtInt: (presenter: ArticlePresenter) => presenter.publishedAtInt(),
  publishedTimestamp: (presenter: ArticlePresenter) => presenter.publishedTimestamp(),
  longMarkdown: (presenter: ArticlePresenter) => presenter.longMarkdown(),
  hasVideo: (presenter: ArticlePresenter) => presenter.hasVideo(),
} as const;

export type PresenterMethodName = keyof typeof presenterMethods;

const ARTICLE_FIELDS: readonly ArticleField[] = [
  'id',
  'title',
  'bodyMarkdown',
  'canonicalUrl',
  'slug',
  'username',
  'authorName',
  'published',
  'password',
  'cachedTagList',
  'boostedAdditionalArticles',
  'organization',
  'publishedAt',
  'searchOptimizedDescriptionReplacement',
  'videoCode',
  'videoSourceUrl',
  'videoThumbnailUrl',
  'videoClosedCaptionTrackUrl',
  'path',
];

export interface SerializeOptions {
  only?: readonly string[];
  methods?: readonly string[];
  placement?: string;
}

export type SerializedArticle = Record<string, unknown>;

// Fields left out when the caller does not choose: the draft preview token
// and the raw markdown.
const DEFAULT_FIELDS: readonly ArticleField[] = ARTICLE_FIELDS.filter(
  (field) => field !== 'password' && field !== 'bodyMarkdown',
);

const articleFieldNames: ReadonlySet<string> = new Set(ARTICLE_FIELDS);

const isArticleField = (name: string): name is ArticleField => articleFieldNames.has(name);

const isPresenterMethod = (name: string): name is PresenterMethodName =>
  Object.prototype.hasOwnProperty.call(presenterMethods, name);

const readField = (article: Readonly<Article>, field: ArticleField): unknown => article[field] ?? null;

export const serializeArticle = (presenter: ArticlePresenter, options: SerializeOptions = {}): SerializedArticle => {
  const only = options.only ?? DEFAULT_FIELDS;
  const result: SerializedArticle = {};
  for (const field of only) {
    if (!isArticleField(field)) {
      throw new ArticlePresentationError('unknown_field', `Unknown article field "${field}"`);
    }
    result[field] = readField(presenter.article, field);
  }
  for (const method of options.methods ?? []) {
    if (!isPresenterMethod(method)) {
      throw new ArticlePresentationError('unknown_method', `Unknown presenter method "${method}"`);
    }
    const derive: PresenterMethod = presenterMethods[method];
    result[method] = derive(presenter, options.placement);
  }
  return result;
};

export const serializeArticles = (
  presenters: readonly ArticlePresenter[],
  options: SerializeOptions = {},
): SerializedArticle[] => presenters.map((presenter) => serializeArticle(presenter, options));
