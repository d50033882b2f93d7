export const DISCUSSION_TAG = 'discuss';

export const parseCachedTagList = (cachedTagList: string | null | undefined): string[] =>
  (cachedTagList ?? '')
    .split(',')
    .map((tag) => tag.trim())
    .filter(Boolean);

export const commentsToShowForTags = (tags: readonly string[]): number => (tags.includes(DISCUSSION_TAG) ? 75 : 25);
