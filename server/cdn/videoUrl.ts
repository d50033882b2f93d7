import type { AppConfig } from '../../shared/config';

export type VideoUrlTransformer = (sourceUrl: string | null | undefined) => string;

export const buildFetchTransformations = (width: number, quality: number): string =>
  ['c_limit', 'f_auto', 'fl_progressive', `q_${quality}`, `w_${width}`].join(',');

/**
 * Routes a remote asset through the CDN's fetch endpoint so thumbnails are
 * resized and re-encoded on the edge. Without a cloud name the source URL is
 * served as-is.
 */
export const createVideoUrlTransformer = (config: Pick<AppConfig, 'cdn'>): VideoUrlTransformer => {
  const { baseUrl, cloudName, videoThumbnailWidth, videoThumbnailQuality } = config.cdn;
  const transformations = buildFetchTransformations(videoThumbnailWidth, videoThumbnailQuality);
  const root = baseUrl.replace(/\/+$/, '');

  return (sourceUrl) => {
    const url = (sourceUrl ?? '').trim();
    if (!url) return '';
    if (!cloudName) return url;
    return `${root}/${cloudName}/image/fetch/${transformations}/${encodeURI(url)}`;
  };
};
