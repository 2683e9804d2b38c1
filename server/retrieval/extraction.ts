import type { MetadataRecord } from '../../shared/types';
import { splitCommaList } from '../utils/text';
import { buildTagIndex, type TagIndex } from './tagIndex';

const FAVICON_RELS = ['icon', 'shortcut icon', 'apple-touch-icon'] as const;

type Candidate = () => string | undefined;

const firstOf = (candidates: Candidate[]): string | undefined => {
  for (const candidate of candidates) {
    const value = candidate();
    if (value) return value;
  }
  return undefined;
};

const metaChain = (index: TagIndex, keys: readonly string[]): Candidate[] => keys.map((key) => () => index.findMeta(key));

const SCHEME_PATTERN = /^[a-z][a-z\d+.-]*:/i;

/**
 * Resolves a possibly relative reference against the page URL. Values that
 * already carry a scheme are returned as written, except `javascript:` ones,
 * which count as absent.
 */
export const resolveUrl = (value: string, pageUrl: string): string | undefined => {
  const trimmed = value.trim();
  if (SCHEME_PATTERN.test(trimmed)) {
    return /^javascript:/i.test(trimmed) ? undefined : trimmed;
  }
  try {
    return new URL(trimmed, pageUrl).toString();
  } catch {
    return undefined;
  }
};

const resolvedChain = (candidates: Candidate[], pageUrl: string): string | undefined =>
  firstOf(
    candidates.map((candidate) => () => {
      const value = candidate();
      return value ? resolveUrl(value, pageUrl) : undefined;
    }),
  );

// Drops absent fields so the record (and its JSON) never carries undefined or "".
const compact = (fields: Omit<MetadataRecord, 'url'>): Omit<MetadataRecord, 'url'> => {
  const out: Omit<MetadataRecord, 'url'> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) Object.assign(out, { [key]: value });
  }
  return out;
};

export const extractFromIndex = (index: TagIndex, pageUrl: string): MetadataRecord => {
  const meta = (...keys: string[]) => firstOf(metaChain(index, keys));
  const metaUrl = (...keys: string[]) => resolvedChain(metaChain(index, keys), pageUrl);

  const keywords = splitCommaList(index.findMeta('keywords'));

  const fields = compact({
    title: firstOf([...metaChain(index, ['og:title', 'twitter:title']), () => index.titleText()]),
    description: meta('og:description', 'twitter:description', 'description'),
    image: metaUrl('og:image', 'twitter:image'),
    site_name: meta('og:site_name'),
    type: meta('og:type'),
    locale: meta('og:locale'),
    author: meta('article:author', 'author'),
    publisher: meta('article:publisher', 'publisher'),
    published_time: meta('article:published_time', 'og:published_time', 'date'),
    modified_time: meta('article:modified_time', 'og:updated_time'),
    video_url: metaUrl('og:video:url', 'og:video', 'og:video:secure_url'),
    audio_url: metaUrl('og:audio:url', 'og:audio'),
    duration: meta('og:video:duration', 'video:duration'),
    twitter_handle: meta('twitter:creator', 'twitter:site'),
    twitter_card: meta('twitter:card'),
    canonical_url: resolvedChain([() => index.findLink('canonical'), () => index.findMeta('og:url')], pageUrl),
    favicon: resolvedChain(
      [...FAVICON_RELS.map((rel) => () => index.findLink(rel)), () => index.findIconLink()],
      pageUrl,
    ),
    theme_color: meta('theme-color'),
    keywords: keywords.length ? Object.freeze(keywords) : undefined,
  });

  return Object.freeze({ url: pageUrl, ...fields });
};

/** Builds the preview record for a page. Never throws; unparseable markup gives a record with only `url`. */
export const extractMetadata = (html: string, pageUrl: string): MetadataRecord =>
  extractFromIndex(buildTagIndex(html), pageUrl);
