import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import {
  ScrapeRequestSchema,
  TwitterScrapeRequestSchema,
  type ScrapeRequest,
  type TwitterScrapeRequest,
} from './dto/scrape-request.dto.js';
import { ScraperService, type ScrapeResult } from './scraper.service.js';

export interface ScrapeResponse {
  data: {
    url: string;
    title: string | null;
    text: string;
    extracted_by: ScrapeResult['extractedBy'];
    fetched_at: string;
  };
}

function present(result: ScrapeResult): ScrapeResponse {
  return {
    data: {
      url: result.url,
      title: result.title,
      text: result.text,
      extracted_by: result.extractedBy,
      fetched_at: result.fetchedAt.toISOString(),
    },
  };
}

@ApiTags('Scraper')
@Controller('scraper')
export class ScraperController {
  constructor(private readonly scraperService: ScraperService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Scrape a web page and return its text' })
  async scrape(
    @Body(new ZodValidationPipe(ScrapeRequestSchema)) body: ScrapeRequest,
  ): Promise<ScrapeResponse> {
    return present(await this.scraperService.scrape(body.url, body.instruction));
  }

  @Post('twitter')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Scrape the text of a tweet' })
  async scrapeTwitter(
    @Body(new ZodValidationPipe(TwitterScrapeRequestSchema)) body: TwitterScrapeRequest,
  ): Promise<ScrapeResponse> {
    return present(await this.scraperService.scrapeTweet(body.url));
  }
}
