import { z } from 'zod';
import { ArticleSnapshotSchema } from '../../shared/articles';
import type { Logger } from '../obs/logger';
import type { ArticlePresenterFactory } from '../presenters/articlePresenter';
import { isArticlePresentationError } from '../presenters/errors';
import { serializeArticle, serializeArticles, type SerializeOptions } from '../presenters/serialization';

export const MAX_ARTICLES_PER_REQUEST = 500;

const nameList = z.array(z.string().min(1)).max(64);

export const PresentRequestSchema = z
  .object({
    article: ArticleSnapshotSchema.optional(),
    articles: z.array(ArticleSnapshotSchema).max(MAX_ARTICLES_PER_REQUEST).optional(),
    only: nameList.optional(),
    methods: nameList.optional(),
    placement: z
      .string()
      .regex(/^[a-z0-9_-]+$/i, 'placement must be URL-safe')
      .optional(),
  })
  .refine((body) => (body.article === undefined) !== (body.articles === undefined), {
    message: 'Provide exactly one of "article" or "articles"',
  });

export interface PresentArticlesResult {
  status: number;
  payload: Record<string, unknown>;
}

export interface PresentArticlesParams {
  body: unknown;
  createPresenter: ArticlePresenterFactory;
  logger: Logger;
}

export const handlePresentArticles = ({ body, createPresenter, logger }: PresentArticlesParams): PresentArticlesResult => {
  const parsed = PresentRequestSchema.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
    logger.warn('Rejected present request', { issues });
    return { status: 400, payload: { error: 'Invalid request body', issues } };
  }

  const { article, articles, only, methods, placement } = parsed.data;
  const options: SerializeOptions = { only, methods, placement };

  try {
    if (article) {
      return { status: 200, payload: { article: serializeArticle(createPresenter(article), options) } };
    }
    const presenters = (articles ?? []).map((item) => createPresenter(item));
    logger.debug('Presenting articles', { count: presenters.length });
    return { status: 200, payload: { articles: serializeArticles(presenters, options) } };
  } catch (error) {
    if (!isArticlePresentationError(error)) {
      throw error;
    }
    logger.warn('Article presentation failed', { code: error.code, error });
    const status = error.code === 'unknown_field' || error.code === 'unknown_method' ? 400 : 422;
    return { status, payload: { error: error.message, code: error.code } };
  }
};
