// Reduces markdown to the text a reader would see.
const blockRules: Array<[RegExp, string]> = [
  [/^[ \t]*(```|~~~).*$/gm, ''],
  [/^[ \t]{0,3}(?:-{3,}|\*{3,}|_{3,})[ \t]*$/gm, ''],
  [/^[ \t]{0,3}#{1,6}[ \t]+/gm, ''],
  [/^[ \t]{0,3}>[ \t]?/gm, ''],
  [/^[ \t]*(?:[-*+]|\d+[.)])[ \t]+/gm, ''],
];

const inlineRules: Array<[RegExp, string]> = [
  [/\{%[\s\S]*?%\}/g, ''],
  [/<!--[\s\S]*?-->/g, ''],
  [/<[^>]+>/g, ''],
  [/!\[[^\]]*\]\([^)]*\)/g, ''],
  [/\[([^\]]+)\]\([^)]*\)/g, '$1'],
  [/\[([^\]]+)\]\[[^\]]*\]/g, '$1'],
  [/`([^`\n]+)`/g, '$1'],
  [/(\*\*|__)(?=\S)([^\n]*?\S)\1/g, '$2'],
  [/\*(?=\S)([^*\n]*?\S)\*/g, '$1'],
  [/(^|[^\w])_(?=\S)([^_\n]*?\S)_(?!\w)/g, '$1$2'],
  [/~~(?=\S)([^\n]*?\S)~~/g, '$1'],
];

export const markdownToPlainText = (markdown: string): string => {
  let text = markdown.replace(/\r\n?/g, '\n');
  for (const [pattern, replacement] of blockRules) {
    text = text.replace(pattern, replacement);
  }
  for (const [pattern, replacement] of inlineRules) {
    text = text.replace(pattern, replacement);
  }
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean)
    .join('\n');
};
