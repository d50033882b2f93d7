export const characterCount = (value: string): number => Array.from(value).length;

export const collapseWhitespace = (value: string | null | undefined): string => {
  if (!value) return '';
  return String(value).replace(/\s+/g, ' ').trim();
};

export interface TruncateResult {
  text: string;
  truncated: boolean;
}

/**
 * Cuts `value` so that the result, omission included, is at most `maxLength`
 * characters. The cut lands on the last space that fits; a single word longer
 * than the budget is cut mid-word.
 */
export const truncateAtWordBoundary = (value: string, maxLength: number, omission = '...'): TruncateResult => {
  const chars = Array.from(value);
  if (chars.length <= maxLength) {
    return { text: value, truncated: false };
  }
  const room = Math.max(0, maxLength - Array.from(omission).length);
  const boundary = chars.lastIndexOf(' ', room);
  const stop = boundary > 0 ? boundary : room;
  return { text: `${chars.slice(0, stop).join('').trimEnd()}${omission}`, truncated: true };
};

const terminalPunctuation = /[.!?]$/;

export const endsWithTerminalPunctuation = (value: string): boolean => terminalPunctuation.test(value);

export const withTerminalPeriod = (value: string): string => (value.endsWith('.') ? value : `${value}.`);
