import { z } from 'zod';
import { httpUrl } from '../../common/zod-schemas.js';

const TWITTER_HOSTS = ['twitter.com', 'x.com'];

export function isTwitterUrl(value: string): boolean {
  let host: string;
  try {
    host = new URL(value).hostname.toLowerCase();
  } catch {
    return false;
  }
  const bare = host.replace(/^(www|mobile)\./, '');
  return TWITTER_HOSTS.includes(bare);
}

export const ScrapeRequestSchema = z.object({
  url: httpUrl,
  instruction: z.string().trim().min(1).max(2000).optional(),
});

export type ScrapeRequest = z.infer<typeof ScrapeRequestSchema>;

export const TwitterScrapeRequestSchema = z.object({
  url: httpUrl.refine(isTwitterUrl, {
    message: 'URL must point to twitter.com or x.com',
  }),
});

export type TwitterScrapeRequest = z.infer<typeof TwitterScrapeRequestSchema>;
