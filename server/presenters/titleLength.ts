import type { TitleLengthClassification } from '../../shared/articles';
import { characterCount } from '../utils/text';

// Checked top to bottom; the first bucket whose floor the title exceeds wins.
const buckets: ReadonlyArray<[number, TitleLengthClassification]> = [
  [100, 'longest'],
  [80, 'longer'],
  [60, 'long'],
  [20, 'medium'],
];

export const classifyTitleLength = (title: string): TitleLengthClassification => {
  const length = characterCount(title);
  for (const [floor, classification] of buckets) {
    if (length > floor) return classification;
  }
  return 'short';
};
