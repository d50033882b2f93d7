export type ArticlePresentationErrorCode =
  | 'missing_published_at'
  | 'invalid_published_at'
  | 'missing_author_name'
  | 'unknown_field'
  | 'unknown_method';

export class ArticlePresentationError extends Error {
  readonly code: ArticlePresentationErrorCode;

  constructor(code: ArticlePresentationErrorCode, message: string) {
    super(message);
    this.name = 'ArticlePresentationError';
    this.code = code;
  }
}

export const isArticlePresentationError = (value: unknown): value is ArticlePresentationError =>
  value instanceof ArticlePresentationError;
