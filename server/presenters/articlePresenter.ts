import type { Article, TitleLengthClassification, VideoMetadata } from '../../shared/articles';
import type { VideoUrlTransformer } from '../cdn/videoUrl';
import { parseFrontMatter, type FrontMatterParser, type FrontMatterResult } from '../markdown/frontMatter';
import { composeDescriptionAndTags } from './description';
import { ArticlePresentationError } from './errors';
import { commentsToShowForTags, parseCachedTagList } from './tagList';
import { classifyTitleLength } from './titleLength';
import { buildInternalUtmParams, DEFAULT_UTM_PLACEMENT } from './utmParams';

export const LONG_MARKDOWN_THRESHOLD = 900;

export interface ArticlePresenterDeps {
  appDomain: string;
  transformVideoUrl: VideoUrlTransformer;
  parseFrontMatter?: FrontMatterParser;
}

/**
 * Read-only view over an article snapshot. Every method is a pure function of
 * the snapshot and the injected collaborators; nothing is written back.
 */
export class ArticlePresenter {
  private frontMatter: FrontMatterResult | null = null;

  constructor(
    readonly article: Readonly<Article>,
    private deps: ArticlePresenterDeps,
  ) {}

  currentStatePath(): string {
    const base = `/${this.article.username}/${this.article.slug}`;
    if (this.article.published) {
      return base;
    }
    return `${base}?preview=${this.article.password ?? ''}`;
  }

  url(): string {
    return `https://${this.deps.appDomain}${this.article.path}`;
  }

  processedCanonicalUrl(): string {
    const canonical = (this.article.canonicalUrl ?? '').trim();
    return canonical || this.url();
  }

  descriptionAndTags(): string {
    return composeDescriptionAndTags({
      searchOptimizedDescriptionReplacement: this.article.searchOptimizedDescriptionReplacement,
      frontMatter: this.parsedFrontMatter(),
      authorName: this.article.authorName,
    });
  }

  cachedTagListArray(): string[] {
    return parseCachedTagList(this.article.cachedTagList);
  }

  commentsToShowCount(): number {
    return commentsToShowForTags(this.cachedTagListArray());
  }

  titleLengthClassification(): TitleLengthClassification {
    return classifyTitleLength(this.article.title);
  }

  internalUtmParams(placement: string = DEFAULT_UTM_PLACEMENT): string {
    return buildInternalUtmParams({
      boosted: this.article.boostedAdditionalArticles,
      organization: this.article.organization,
      placement,
    });
  }

  videoMetadata(): VideoMetadata {
    return {
      id: this.article.id,
      videoCode: this.article.videoCode ?? null,
      videoSourceUrl: this.article.videoSourceUrl ?? null,
      videoThumbnailUrl: this.deps.transformVideoUrl(this.article.videoThumbnailUrl),
      videoClosedCaptionTrackUrl: this.article.videoClosedCaptionTrackUrl ?? null,
    };
  }

  publishedAtInt(): number {
    return Math.floor(this.requirePublishedAt().getTime() / 1000);
  }

  publishedTimestamp(): string {
    return this.article.publishedAt ? this.requirePublishedAt().toISOString() : '';
  }

  longMarkdown(): boolean {
    return this.article.bodyMarkdown.length > LONG_MARKDOWN_THRESHOLD;
  }

  hasVideo(): boolean {
    return Boolean(this.article.videoSourceUrl?.trim());
  }

  private parsedFrontMatter(): FrontMatterResult {
    if (!this.frontMatter) {
      const parse = this.deps.parseFrontMatter ?? parseFrontMatter;
      this.frontMatter = parse(this.article.bodyMarkdown);
    }
    return this.frontMatter;
  }

  private requirePublishedAt(): Date {
    const { publishedAt } = this.article;
    if (!publishedAt) {
      throw new ArticlePresentationError(
        'missing_published_at',
        `Article ${this.article.id} has no publishedAt timestamp`,
      );
    }
    if (Number.isNaN(publishedAt.getTime())) {
      throw new ArticlePresentationError(
        'invalid_published_at',
        `Article ${this.article.id} has an invalid publishedAt timestamp`,
      );
    }
    return publishedAt;
  }
}

export type ArticlePresenterFactory = (article: Article) => ArticlePresenter;

export const createArticlePresenterFactory =
  (deps: ArticlePresenterDeps): ArticlePresenterFactory =>
  (article) =>
    new ArticlePresenter(article, deps);
