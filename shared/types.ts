/**
 * Preview metadata for one page. Field names match the JSON payload.
 * Absent fields are omitted, never empty strings; URL-valued fields are absolute.
 */
export interface MetadataRecord {
  url: string;
  title?: string;
  description?: string;
  image?: string;
  site_name?: string;
  type?: string;
  locale?: string;
  author?: string;
  publisher?: string;
  /** Copied from the markup as written, not parsed. */
  published_time?: string;
  modified_time?: string;
  video_url?: string;
  audio_url?: string;
  duration?: string;
  twitter_handle?: string;
  twitter_card?: string;
  canonical_url?: string;
  favicon?: string;
  theme_color?: string;
  keywords?: readonly string[];
}

export type UnfurlErrorCode =
  | 'timeout'
  | 'http_status'
  | 'network'
  | 'too_large'
  | 'not_html'
  | 'blocked'
  | 'unexpected';

export type UnfurlResult =
  | { success: true; data: MetadataRecord }
  | { success: false; error: string; code: UnfurlErrorCode };
