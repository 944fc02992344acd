// Knowledge ingestion: URL-only items are scraped, every item is embedded

import { Injectable, Logger } from '@nestjs/common';
import { BadRequestError, ScrapeFailedError } from '../common/errors/api-errors.js';
import { isBlank } from '../common/text-utils.js';
import type { Metadata } from '../db/schema/index.js';
import type { KnowledgeSource, NewKnowledgeRow } from '../db/types/index.js';
import { EmbeddingService } from '../openai/embedding.service.js';
import { ScraperService } from '../scraper/scraper.service.js';
import type { KnowledgeCreate } from './dto/knowledge-create.dto.js';

export const MISSING_URL_OR_CONTENT =
  'Each knowledge item must have either a URL or content';

/** A knowledge row ready to insert once its data instance id is known */
export type PreparedKnowledge = Omit<NewKnowledgeRow, 'dataInstanceId'>;

@Injectable()
export class KnowledgeIngestionService {
  private readonly logger = new Logger(KnowledgeIngestionService.name);

  constructor(
    private readonly scraper: ScraperService,
    private readonly embeddings: EmbeddingService,
  ) {}

  /** 400 when any item has neither a URL nor non-blank content */
  validate(items: KnowledgeCreate[]): void {
    const invalid = items.findIndex((k) => !k.url && isBlank(k.content));
    if (invalid >= 0) {
      throw new BadRequestError(MISSING_URL_OR_CONTENT, { index: invalid });
    }
  }

  /**
   * Scrapes and embeds each item in order, before any row is written. A page
   * that cannot be scraped is kept as a URL-only row marked `scrape_failed`.
   */
  async prepare(items: KnowledgeCreate[]): Promise<PreparedKnowledge[]> {
    this.validate(items);
    const prepared: PreparedKnowledge[] = [];
    for (const item of items) {
      prepared.push(await this.prepareOne(item));
    }
    return prepared;
  }

  private async prepareOne(item: KnowledgeCreate): Promise<PreparedKnowledge> {
    const url = item.url ?? null;
    let title = isBlank(item.title) ? null : (item.title?.trim() ?? null);
    let content = isBlank(item.content) ? null : (item.content ?? null);
    let source: KnowledgeSource = 'manual';
    const metadata: Metadata = { ...item.metadata };

    if (url && content === null) {
      try {
        const page = await this.scraper.scrape(url);
        content = page.text;
        if (title === null) title = page.title;
        source = 'scraped';
        metadata.scraped_at = page.fetchedAt.toISOString();
        metadata.extracted_by = page.extractedBy;
        this.logger.log(`Scraped ${url} (${page.text.length} chars)`);
      } catch (err) {
        if (!(err instanceof ScrapeFailedError)) throw err;
        source = 'scrape_failed';
        metadata.scrape_error = err.message;
        this.logger.warn(`Keeping ${url} without content: ${err.message}`);
      }
    }
    metadata.source = source;

    return {
      url,
      title,
      content,
      metadata,
      category: item.category,
      tags: item.tags,
      embedding: await this.embeddings.embedKnowledge(title, content),
    };
  }
}
