import { z } from 'zod';

export interface ArticleOrganization {
  slug: string;
}

export interface Article {
  id: number | string;
  title: string;
  bodyMarkdown: string;
  canonicalUrl?: string | null;
  slug: string;
  username: string;
  authorName: string;
  published: boolean;
  password?: string | null;
  cachedTagList: string;
  boostedAdditionalArticles: boolean;
  organization?: ArticleOrganization | null;
  publishedAt?: Date | null;
  searchOptimizedDescriptionReplacement?: string | null;
  videoCode?: string | null;
  videoSourceUrl?: string | null;
  videoThumbnailUrl?: string | null;
  videoClosedCaptionTrackUrl?: string | null;
  path: string;
}

export type ArticleField = keyof Article;

export type TitleLengthClassification = 'longest' | 'longer' | 'long' | 'medium' | 'short';

export interface VideoMetadata {
  id: Article['id'];
  videoCode: string | null;
  videoSourceUrl: string | null;
  videoThumbnailUrl: string;
  videoClosedCaptionTrackUrl: string | null;
}

const optionalText = z.string().nullish();

export const ArticleSnapshotSchema = z.object({
  id: z.union([z.number().int(), z.string().min(1)]),
  title: z.string(),
  bodyMarkdown: z.string().default(''),
  canonicalUrl: optionalText,
  slug: z.string().min(1),
  username: z.string().min(1),
  authorName: z.string().trim().min(1, 'authorName is required'),
  published: z.boolean(),
  password: optionalText,
  cachedTagList: z.string().default(''),
  boostedAdditionalArticles: z.boolean().default(false),
  organization: z.object({ slug: z.string().min(1) }).nullish(),
  publishedAt: z
    .string()
    .datetime({ offset: true })
    .nullish()
    .transform((value) => (value ? new Date(value) : null)),
  searchOptimizedDescriptionReplacement: optionalText,
  videoCode: optionalText,
  videoSourceUrl: optionalText,
  videoThumbnailUrl: optionalText,
  videoClosedCaptionTrackUrl: optionalText,
  path: z.string().startsWith('/', 'path must start with "/"'),
});
