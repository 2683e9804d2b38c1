import * as cheerio from 'cheerio';
import { cleanText } from '../utils/text';

/**
 * Read-only lookups over the meta, link and title tags of one document.
 * The parse tree itself never leaves this module.
 */
export interface TagIndex {
  /** Content of the first meta tag whose `property` equals key, else of the first whose `name` does. */
  findMeta: (key: string) => string | undefined;
  /** Href of the first link tag whose rel equals relValue (case-insensitive). */
  findLink: (relValue: string) => string | undefined;
  /** Href of the first link tag with a rel token containing "icon". */
  findIconLink: () => string | undefined;
  titleText: () => string | undefined;
}

interface MetaEntry {
  property?: string;
  name?: string;
  content?: string;
}

interface LinkEntry {
  rel: string;
  href?: string;
}

const normalizeRel = (rel: string): string => rel.trim().replace(/\s+/g, ' ').toLowerCase();

const createIndex = (meta: MetaEntry[], links: LinkEntry[], title: string | undefined): TagIndex => ({
  findMeta: (key) => {
    const byProperty = meta.find((entry) => entry.property === key);
    const fromProperty = cleanText(byProperty?.content);
    if (fromProperty) return fromProperty;
    const byName = meta.find((entry) => entry.name === key);
    return cleanText(byName?.content);
  },
  findLink: (relValue) => {
    const wanted = normalizeRel(relValue);
    const link = links.find((entry) => entry.rel === wanted);
    return cleanText(link?.href);
  },
  findIconLink: () => {
    const link = links.find((entry) => entry.rel.split(' ').some((token) => token.includes('icon')));
    return cleanText(link?.href);
  },
  titleText: () => title,
});

export const EMPTY_TAG_INDEX: TagIndex = createIndex([], [], undefined);

const indexDocument = (html: string): TagIndex => {
  const $ = cheerio.load(html);

  const meta: MetaEntry[] = $('meta')
    .toArray()
    .map((element) => ({
      property: element.attribs.property,
      name: element.attribs.name,
      content: element.attribs.content,
    }));

  const links: LinkEntry[] = $('link[rel]')
    .toArray()
    .map((element) => ({
      rel: normalizeRel(element.attribs.rel ?? ''),
      href: element.attribs.href,
    }));

  return createIndex(meta, links, cleanText($('title').first().text()));
};

/** Never throws: markup the parser rejects yields an index with no tags. */
export const buildTagIndex = (html: string): TagIndex => {
  try {
    return indexDocument(html);
  } catch {
    return EMPTY_TAG_INDEX;
  }
};
