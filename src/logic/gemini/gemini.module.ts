import { Module } from '@nestjs/common';
import { GeminiService } from './gemini.service';
import { ChatModel, EmbeddingModel } from './model.ports';

@Module({
    exports: [GeminiService, EmbeddingModel, ChatModel],
    providers: [
        GeminiService,
        { provide: EmbeddingModel, useExisting: GeminiService },
        { provide: ChatModel, useExisting: GeminiService },
    ],
})
export class GeminiModule {}
