// Environment-backed configuration, read once at startup

import { Injectable, Logger } from '@nestjs/common';

export const ENVIRONMENTS = ['development', 'staging', 'production'] as const;
export type Environment = (typeof ENVIRONMENTS)[number];

export interface ScraperConfig {
  timeoutMs: number;
  maxRetries: number;
  maxChars: number;
  /** Response bodies are read up to this many bytes */
  maxBytes: number;
}

export interface AppConfig {
  databaseUrl: string;
  supabaseUrl: string;
  supabaseKey: string;
  openaiApiKey: string;
  embeddingModel: string;
  extractionModel: string;
  environment: Environment;
  appEnv: string;
  port: number;
  jwtSecret: string;
  jwtExpiresIn: string;
  scraper: ScraperConfig;
  studioUnlockCost: number;
}

/** GET /api/v1/settings response; secrets are reported as flags only */
export interface AppConfigPublic {
  environment: Environment;
  app_env: string;
  supabase_url: string | null;
  openai_api_key_set: boolean;
  embedding_model: string;
  extraction_model: string;
  studio_unlock_cost: number;
  scraper: {
    timeout_ms: number;
    max_retries: number;
    max_chars: number;
    max_bytes: number;
  };
}

/** Variables main.ts refuses to start without */
export const REQUIRED_ENV_VARS = ['DATABASE_URL', 'JWT_SECRET'] as const;

function toEnvironment(value: string | undefined): Environment {
  const match = ENVIRONMENTS.find((e) => e === value);
  return match ?? 'development';
}

function toInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    databaseUrl: env.DATABASE_URL ?? '',
    supabaseUrl: env.SUPABASE_URL ?? '',
    supabaseKey: env.SUPABASE_KEY ?? '',
    openaiApiKey: env.OPENAI_API_KEY ?? '',
    embeddingModel: env.OPENAI_EMBEDDING_MODEL ?? 'text-embedding-3-small',
    extractionModel: env.OPENAI_EXTRACTION_MODEL ?? 'gpt-4o-mini',
    environment: toEnvironment(env.ENVIRONMENT),
    appEnv: env.APP_ENV ?? 'development',
    port: toInt(env.PORT, 8080),
    jwtSecret: env.JWT_SECRET ?? '',
    jwtExpiresIn: env.JWT_EXPIRES_IN ?? '7d',
    scraper: {
      timeoutMs: toInt(env.SCRAPER_TIMEOUT_MS, 15000),
      maxRetries: Math.max(1, toInt(env.SCRAPER_MAX_RETRIES, 2)),
      maxChars: toInt(env.SCRAPER_MAX_CHARS, 20000),
      maxBytes: toInt(env.SCRAPER_MAX_BYTES, 2000000),
    },
    studioUnlockCost: toInt(env.STUDIO_UNLOCK_COST, 150),
  };
}

@Injectable()
export class AppConfigService {
  private readonly logger = new Logger(AppConfigService.name);
  private config: AppConfig;

  constructor() {
    this.config = loadConfig();
    this.logger.log(
      `Loaded config (environment=${this.config.environment}, openai=${this.isOpenAiEnabled()})`,
    );
  }

  get(): AppConfig {
    return this.config;
  }

  /** Replace fields in place; used to pin settings in tests and scripts */
  update(patch: Partial<AppConfig>): AppConfig {
    this.config = { ...this.config, ...patch };
    return this.config;
  }

  isProduction(): boolean {
    return (
      this.config.environment === 'production' ||
      this.config.appEnv === 'production'
    );
  }

  isOpenAiEnabled(): boolean {
    return !!this.config.openaiApiKey;
  }

  getPublic(): AppConfigPublic {
    return {
      environment: this.config.environment,
      app_env: this.config.appEnv,
      supabase_url: this.config.supabaseUrl || null,
      openai_api_key_set: this.isOpenAiEnabled(),
      embedding_model: this.config.embeddingModel,
      extraction_model: this.config.extractionModel,
      studio_unlock_cost: this.config.studioUnlockCost,
      scraper: {
        timeout_ms: this.config.scraper.timeoutMs,
        max_retries: this.config.scraper.maxRetries,
        max_chars: this.config.scraper.maxChars,
        max_bytes: this.config.scraper.maxBytes,
      },
    };
  }
}
