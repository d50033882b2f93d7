import { markdownToPlainText } from './plainText';

export interface FrontMatterResult {
  description: string;
  tags: string[];
  plainBody: string;
}

export type FrontMatterParser = (bodyMarkdown: string) => FrontMatterResult;

const frontMatterBlock = /^---[ \t]*\n(?:([\s\S]*?)\n)?---[ \t]*(?:\n|$)/;

const unquote = (value: string): string => {
  const trimmed = value.trim();
  if (trimmed.length >= 2) {
    const first = trimmed[0];
    const last = trimmed[trimmed.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      return trimmed.slice(1, -1);
    }
  }
  return trimmed;
};

export const parseAttributes = (block: string): Record<string, string> => {
  const attributes: Record<string, string> = {};
  for (const line of block.split('\n')) {
    const separator = line.indexOf(':');
    if (separator <= 0 || /^\s|^#/.test(line)) continue;
    const key = line.slice(0, separator).trim().toLowerCase();
    attributes[key] = unquote(line.slice(separator + 1));
  }
  return attributes;
};

export const splitTags = (value: string | null | undefined): string[] => {
  if (!value) return [];
  return value
    .replace(/^\[|\]$/g, '')
    .split(/[,\s]+/)
    .map((tag) => unquote(tag).replace(/^#/, ''))
    .filter(Boolean);
};

export const splitFrontMatter = (bodyMarkdown: string): { attributes: Record<string, string>; body: string } => {
  const normalized = bodyMarkdown.replace(/\r\n?/g, '\n');
  const match = frontMatterBlock.exec(normalized);
  if (!match) {
    return { attributes: {}, body: normalized };
  }
  return {
    attributes: parseAttributes(match[1] ?? ''),
    body: normalized.slice(match[0].length),
  };
};

export const parseFrontMatter: FrontMatterParser = (bodyMarkdown) => {
  const { attributes, body } = splitFrontMatter(bodyMarkdown);
  return {
    description: attributes.description ?? '',
    tags: splitTags(attributes.tags),
    plainBody: markdownToPlainText(body),
  };
};
