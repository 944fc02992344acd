// Page scraping: fetch with retries, HTML reduction, optional LLM cleanup

import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { AppConfigService } from '../config/app-config.service.js';
import { ScrapeFailedError } from '../common/errors/api-errors.js';
import { truncate } from '../common/text-utils.js';
import { OpenAiClientService } from '../openai/openai-client.service.js';
import { extractTitle, htmlToText } from './html-text.js';

export const DEFAULT_INSTRUCTION = 'Extract the text from the url above';
export const TWEET_INSTRUCTION = 'Extract the text from the tweet above';

export const TWEET_OEMBED_ENDPOINT = 'https://publish.twitter.com/oembed';

const USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

const EXTRACTION_SYSTEM_PROMPT =
  'You extract the main readable content of a web page. Reply with plain text only, no commentary.';

const JSON_TYPE = /[/+]json\b/i;
const MARKUP_TYPE = /html|[/+]xml\b/i;
const BINARY_TYPE =
  /^(image|audio|video|font)\/|^application\/(pdf|octet-stream|zip|gzip|x-tar|x-7z-compressed|vnd\.rar|msword|wasm)\b/i;

const TweetEmbedSchema = z.object({
  html: z.string().min(1),
  author_name: z.string().optional(),
});

export type ExtractedBy = 'openai' | 'html';
export type FailureCategory = 'RETRYABLE' | 'PERMANENT';
type BodyKind = 'markup' | 'json' | 'text';

export interface ScrapeResult {
  url: string;
  title: string | null;
  text: string;
  extractedBy: ExtractedBy;
  fetchedAt: Date;
}

interface FetchedPage {
  url: string;
  body: string;
  kind: BodyKind;
}

class FetchFailure extends Error {
  constructor(
    message: string,
    readonly category: FailureCategory,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'FetchFailure';
  }
}

/** 408, 429 and 5xx are worth another attempt; other statuses are not */
export function classifyStatus(status: number): FailureCategory {
  if (status === 408 || status === 429 || status >= 500) return 'RETRYABLE';
  return 'PERMANENT';
}

/** null for bodies that cannot be read as text */
export function classifyContentType(contentType: string): BodyKind | null {
  if (JSON_TYPE.test(contentType)) return 'json';
  if (MARKUP_TYPE.test(contentType)) return 'markup';
  if (BINARY_TYPE.test(contentType.trim())) return null;
  return 'text';
}

function toFailure(err: unknown): FetchFailure {
  if (err instanceof FetchFailure) return err;
  // network errors, DNS failures and AbortSignal timeouts
  return new FetchFailure(String(err), 'RETRYABLE');
}

function prettyJson(body: string): string {
  try {
    return JSON.stringify(JSON.parse(body), null, 2);
  } catch {
    return body.trim();
  }
}

function pageText(page: FetchedPage): string {
  switch (page.kind) {
    case 'markup':
      return htmlToText(page.body);
    case 'json':
      return prettyJson(page.body);
    case 'text':
      return page.body.trim();
  }
}

@Injectable()
export class ScraperService {
  private readonly logger = new Logger(ScraperService.name);

  constructor(
    private readonly configService: AppConfigService,
    private readonly openai: OpenAiClientService,
  ) {}

  async scrape(url: string, instruction: string = DEFAULT_INSTRUCTION): Promise<ScrapeResult> {
    const page = await this.fetchPage(url);
    const title = page.kind === 'markup' ? extractTitle(page.body) : null;
    return this.finish(page.url, title, pageText(page), instruction);
  }

  /** Tweet text via oEmbed, falling back to the tweet page itself */
  async scrapeTweet(url: string): Promise<ScrapeResult> {
    const query = new URLSearchParams({ url, omit_script: 'true' });
    let embed: z.infer<typeof TweetEmbedSchema>;
    try {
      const page = await this.fetchPage(`${TWEET_OEMBED_ENDPOINT}?${query.toString()}`);
      embed = TweetEmbedSchema.parse(JSON.parse(page.body));
    } catch (err) {
      this.logger.warn(`oEmbed lookup for ${url} failed, fetching the page: ${String(err)}`);
      return this.scrape(url, TWEET_INSTRUCTION);
    }

    const title = embed.author_name ? `Tweet by ${embed.author_name}` : null;
    return this.finish(url, title, htmlToText(embed.html), TWEET_INSTRUCTION);
  }

  private async finish(
    url: string,
    title: string | null,
    text: string,
    instruction: string,
  ): Promise<ScrapeResult> {
    const { maxChars } = this.configService.get().scraper;
    const plain = truncate(text, maxChars);
    if (!plain) {
      throw new ScrapeFailedError(`No readable text at ${url}`, { url });
    }

    const extracted = await this.extract(url, plain, instruction);
    return {
      url,
      title,
      text: truncate(extracted.text, maxChars),
      extractedBy: extracted.by,
      fetchedAt: new Date(),
    };
  }

  private async fetchPage(url: string): Promise<FetchedPage> {
    const { maxRetries } = this.configService.get().scraper;
    let attempt = 0;

    for (;;) {
      attempt++;
      try {
        return await this.fetchOnce(url);
      } catch (err) {
        const failure = toFailure(err);
        this.logger.warn(
          `Fetch ${url} attempt ${attempt}/${maxRetries} failed (${failure.category}): ${failure.message}`,
        );
        if (failure.category === 'PERMANENT' || attempt >= maxRetries) {
          throw new ScrapeFailedError(`Failed to fetch ${url}: ${failure.message}`, {
            url,
            attempts: attempt,
            status: failure.status ?? null,
          });
        }
      }
    }
  }

  private async fetchOnce(url: string): Promise<FetchedPage> {
    const { timeoutMs } = this.configService.get().scraper;
    const res = await fetch(url, {
      headers: {
        'User-Agent': USER_AGENT,
        Accept: 'text/html,application/xhtml+xml,application/json,text/plain;q=0.9,*/*;q=0.8',
      },
      redirect: 'follow',
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (!res.ok) {
      await res.body?.cancel();
      throw new FetchFailure(`HTTP ${res.status}`, classifyStatus(res.status), res.status);
    }

    const contentType = res.headers.get('content-type') ?? '';
    const kind = classifyContentType(contentType);
    if (!kind) {
      await res.body?.cancel();
      throw new FetchFailure(`Unsupported content type "${contentType}"`, 'PERMANENT', res.status);
    }

    return { url: res.url || url, body: await this.readBody(res, url), kind };
  }

  // Stops reading at SCRAPER_MAX_BYTES and cancels the rest of the stream.
  private async readBody(res: Response, url: string): Promise<string> {
    const { maxBytes } = this.configService.get().scraper;
    if (!res.body) return '';

    const declared = Number(res.headers.get('content-length'));
    if (declared > maxBytes) {
      this.logger.warn(`${url} declares ${declared} bytes, reading the first ${maxBytes}`);
    }

    const reader = res.body.getReader();
    const chunks: Uint8Array[] = [];
    let total = 0;
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      const room = maxBytes - total;
      const chunk = value.byteLength > room ? value.subarray(0, room) : value;
      chunks.push(chunk);
      total += chunk.byteLength;
      if (total >= maxBytes) {
        await reader.cancel();
        break;
      }
    }
    return Buffer.concat(chunks).toString('utf-8');
  }

  private async extract(
    url: string,
    plain: string,
    instruction: string,
  ): Promise<{ text: string; by: ExtractedBy }> {
    const client = this.openai.getClient();
    if (!client) return { text: plain, by: 'html' };

    try {
      const completion = await client.chat.completions.create({
        model: this.configService.get().extractionModel,
        temperature: 0,
        messages: [
          { role: 'system', content: EXTRACTION_SYSTEM_PROMPT },
          { role: 'user', content: `URL: ${url}\n\n${plain}\n\n${instruction}` },
        ],
      });
      const text = completion.choices[0]?.message?.content?.trim();
      if (text) return { text, by: 'openai' };
      this.logger.warn(`Extraction for ${url} returned no text, using page text`);
    } catch (err) {
      this.logger.warn(`Extraction for ${url} failed, using page text: ${String(err)}`);
    }
    return { text: plain, by: 'html' };
  }
}
