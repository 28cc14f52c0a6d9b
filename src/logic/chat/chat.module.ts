import { Module } from '@nestjs/common';
import { ChatMemoryModule } from '../chat-memory/chat-memory.module';
import { GeminiModule } from '../gemini/gemini.module';
import { RetrievalModule } from '../retrieval/retrieval.module';
import { AnswerGeneratorService } from './answer-generator.service';
import { ChatController } from './chat.controller';
import { ChatService } from './chat.service';

@Module({
    imports: [
        ChatMemoryModule,
        GeminiModule,
        RetrievalModule,
    ],
    controllers: [ChatController],
    providers: [ChatService, AnswerGeneratorService],
    exports: [ChatService],
})
export class ChatModule {}
