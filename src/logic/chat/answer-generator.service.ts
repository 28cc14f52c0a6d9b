import { Inject, Injectable } from '@nestjs/common';
import { ragConfig, RagConfig } from '../../config/configuration';
import { StageTimeoutError } from '../../utils/errors';
import { withTimeout } from '../../utils/timeout';
import { RetrievedChunk } from '../../utils/types';
import { HistoryTurn } from '../chat-memory/conversation-rewriter.service';
import { ChatMessage, ChatModel } from '../gemini/model.ports';
import { ANSWER_SYSTEM, buildAnswerUser } from './prompt';

@Injectable()
export class AnswerGeneratorService {
    constructor(
        @Inject(ragConfig.KEY) private readonly config: RagConfig,
        private readonly chatModel: ChatModel,
    ) { }

    async generate(standaloneQuery: string, chunks: RetrievedChunk[], history: HistoryTurn[]): Promise<string> {
        const messages: ChatMessage[] = history.flatMap(turn => [
            { role: 'user' as const, content: turn.userUtterance },
            { role: 'assistant' as const, content: turn.answerText },
        ]);

        const answer = await withTimeout(
            signal => this.chatModel.complete(ANSWER_SYSTEM, buildAnswerUser(standaloneQuery, chunks), messages, { signal }),
            this.config.generationTimeoutMs,
            () => new StageTimeoutError('generate', this.config.generationTimeoutMs)
        );
        if (!answer.trim()) {
            throw new Error('Generation returned an empty answer');
        }
        return answer.trim();
    }
}
