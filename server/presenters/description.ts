import type { FrontMatterResult } from '../markdown/frontMatter';
import { ArticlePresentationError } from './errors';
import { collapseWhitespace, endsWithTerminalPunctuation, truncateAtWordBoundary, withTerminalPeriod } from '../utils/text';

export const DESCRIPTION_MAX_LENGTH = 104;

export interface DescriptionInput {
  searchOptimizedDescriptionReplacement?: string | null;
  frontMatter: FrontMatterResult;
  authorName: string;
}

export const describeBody = (plainBody: string, authorName: string): string => {
  const text = collapseWhitespace(plainBody);
  if (!text) {
    const author = authorName.trim();
    if (!author) {
      throw new ArticlePresentationError(
        'missing_author_name',
        'An author name is required to describe an article without body text',
      );
    }
    return withTerminalPeriod(`A post by ${author}`);
  }
  const { text: summary, truncated } = truncateAtWordBoundary(text, DESCRIPTION_MAX_LENGTH);
  if (truncated || endsWithTerminalPunctuation(summary)) {
    return summary;
  }
  return `${summary}.`;
};

export const baseDescription = ({ frontMatter, authorName }: DescriptionInput): string => {
  const explicit = collapseWhitespace(frontMatter.description);
  if (explicit) {
    return endsWithTerminalPunctuation(explicit) ? explicit : `${explicit}.`;
  }
  return describeBody(frontMatter.plainBody, authorName);
};

export const composeDescriptionAndTags = (input: DescriptionInput): string => {
  const replacement = input.searchOptimizedDescriptionReplacement;
  if (replacement && replacement.trim()) {
    return replacement;
  }
  const description = baseDescription(input);
  if (input.frontMatter.tags.length === 0) {
    return description;
  }
  return `${description} Tagged with ${input.frontMatter.tags.join(', ')}.`;
};
