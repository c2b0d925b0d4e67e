import { Global, Module } from '@nestjs/common';
import { GeminiService } from './gemini.service';

/** Shared model client for embeddings, routing and generation. */
@Global()
@Module({
    providers: [GeminiService],
    exports: [GeminiService],
})
export class GeminiModule {}
