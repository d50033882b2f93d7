import { describe, expect, it } from 'vitest';
import { composeDescriptionAndTags, describeBody } from '../description';
import { ArticlePresentationError } from '../errors';

describe('describeBody', () => {
  it('keeps existing terminal punctuation', () => {
    expect(describeBody('Is this the end?', 'Jane')).toBe('Is this the end?');
  });

  it('collapses whitespace before summarizing', () => {
    expect(describeBody('  First line\n\nsecond line  ', 'Jane')).toBe('First line second line.');
  });

  it('requires an author name when the body is empty', () => {
    expect(() => describeBody('', '  ')).toThrow(ArticlePresentationError);
    expect(() => describeBody('', '')).toThrow('An author name is required to describe an article without body text');
    expect(describeBody('Has text', '')).toBe('Has text.');
  });
});

describe('composeDescriptionAndTags', () => {
  it('ignores a whitespace-only replacement', () => {
    expect(
      composeDescriptionAndTags({
        searchOptimizedDescriptionReplacement: '   ',
        frontMatter: { description: '', tags: [], plainBody: 'Body' },
        authorName: 'Jane',
      }),
    ).toBe('Body.');
  });

  it('returns the replacement even when tags exist', () => {
    expect(
      composeDescriptionAndTags({
        searchOptimizedDescriptionReplacement: 'Custom summary',
        frontMatter: { description: 'Ignored', tags: ['tea'], plainBody: 'Body' },
        authorName: 'Jane',
      }),
    ).toBe('Custom summary');
  });
});
