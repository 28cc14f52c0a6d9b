import { Module } from '@nestjs/common';
import { GeminiModule } from '../gemini/gemini.module';
import { PersistenceModule } from '../persistence/persistence.module';
import { ChatMemoryService } from './chat-memory.service';
import { ConversationRewriterService } from './conversation-rewriter.service';

@Module({
    imports: [GeminiModule, PersistenceModule],
    exports: [ChatMemoryService, ConversationRewriterService],
    providers: [ChatMemoryService, ConversationRewriterService],
})
export class ChatMemoryModule {}
