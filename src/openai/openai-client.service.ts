// Shared OpenAI SDK client, created on first use

import { Injectable } from '@nestjs/common';
import OpenAI from 'openai';
import { AppConfigService } from '../config/app-config.service.js';

@Injectable()
export class OpenAiClientService {
  private client: OpenAI | null = null;

  constructor(private readonly configService: AppConfigService) {}

  isEnabled(): boolean {
    return this.configService.isOpenAiEnabled();
  }

  /** null when OPENAI_API_KEY is not set */
  getClient(): OpenAI | null {
    if (!this.isEnabled()) return null;
    if (!this.client) {
      this.client = new OpenAI({
        apiKey: this.configService.get().openaiApiKey,
        maxRetries: 1,
      });
    }
    return this.client;
  }
}
