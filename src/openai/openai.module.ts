import { Global, Module } from '@nestjs/common';
import { OpenAiClientService } from './openai-client.service.js';
import { EmbeddingService } from './embedding.service.js';

@Global()
@Module({
  providers: [OpenAiClientService, EmbeddingService],
  exports: [OpenAiClientService, EmbeddingService],
})
export class OpenAiModule {}
