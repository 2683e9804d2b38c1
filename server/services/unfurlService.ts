import type { UnfurlResult } from '../../shared/types';
import type { Logger } from '../obs/logger';
import { extractMetadata } from '../retrieval/extraction';
import { FetchError, type Fetcher } from '../retrieval/fetcher';

export const UNEXPECTED_ERROR_MESSAGE = 'An unexpected error occurred while processing the URL';

export interface UnfurlDeps {
  fetcher: Fetcher;
  logger: Logger;
}

/**
 * Fetches a page and extracts its preview metadata. Never rejects: every
 * failure comes back as `{ success: false }` with a message naming the URL.
 */
export const unfurl = async (url: string, { fetcher, logger }: UnfurlDeps): Promise<UnfurlResult> => {
  const startedAt = Date.now();
  try {
    const html = await fetcher.fetchHtml(url);
    const data = extractMetadata(html, url);
    logger.debug('Unfurled URL', {
      url,
      fields: Object.keys(data).length - 1,
      elapsedMs: Date.now() - startedAt,
    });
    return { success: true, data };
  } catch (error) {
    if (error instanceof FetchError) {
      logger.warn('Fetch failed', { url, kind: error.kind, message: error.message });
      return { success: false, error: error.message, code: error.kind };
    }
    logger.error('Unexpected error while unfurling', { url, error });
    return { success: false, error: UNEXPECTED_ERROR_MESSAGE, code: 'unexpected' };
  }
};
