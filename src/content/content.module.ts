import { Global, Module } from '@nestjs/common';
import { ContentLoaderService } from './content-loader.service.js';

@Global()
@Module({
  providers: [
    {
      provide: ContentLoaderService,
      useFactory: () => new ContentLoaderService(),
    },
  ],
  exports: [ContentLoaderService],
})
export class ContentModule {}
