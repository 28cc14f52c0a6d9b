import { Inject, Injectable, Logger } from '@nestjs/common';
import { ragConfig, RagConfig } from '../../config/configuration';
import { ConversationTurn } from '../../entities';
import { AccessDeniedError, errorMessage, InvalidSubmissionError, TurnFailedError } from '../../utils/errors';
import { AskResult } from '../../utils/types';
import { parseRole } from '../access-policy/access-policy';
import { ChatMemoryService } from '../chat-memory/chat-memory.service';
import { ConversationRewriterService } from '../chat-memory/conversation-rewriter.service';
import { RerankerService } from '../retrieval/reranker.service';
import { RetrieverService } from '../retrieval/retriever.service';
import { AnswerGeneratorService } from './answer-generator.service';
import { formatCitations } from './citations';
import { NO_PERMITTED_INFORMATION_ANSWER } from './prompt';
import { TurnState, TurnStateMachine } from './turn-state';

@Injectable()
export class ChatService {
    private readonly logger = new Logger(ChatService.name);

    constructor(
        @Inject(ragConfig.KEY) private readonly config: RagConfig,
        private readonly chatMemoryService: ChatMemoryService,
        private readonly rewriter: ConversationRewriterService,
        private readonly retriever: RetrieverService,
        private readonly reranker: RerankerService,
        private readonly answerGenerator: AnswerGeneratorService,
    ) { }

    /**
     * One query turn: rewrite, retrieve within the role's sources, rerank,
     * answer, persist. The role is checked before anything else runs. Any
     * stage failure aborts the turn with a generic error and nothing is
     * persisted; a failed rerank only degrades the ordering.
     */
    async ask(sessionId: string, role: unknown, utterance: string): Promise<AskResult> {
        const callerRole = parseRole(role);
        if (!utterance.trim()) {
            throw new InvalidSubmissionError('utterance is required');
        }

        const machine = new TurnStateMachine((from, to) => this.logger.debug(`[${sessionId}] ${from} -> ${to}`));
        try {
            const history = await this.chatMemoryService.getRecentHistory(sessionId, this.config.rewriteHistoryTurns);
            const standaloneQuery = await this.rewriter.rewrite(utterance, history);
            machine.advance(TurnState.REWRITTEN);

            const retrieved = await this.retriever.retrieve(standaloneQuery, callerRole);
            machine.advance(TurnState.RETRIEVED);

            const { chunks } = await this.reranker.rerank(standaloneQuery, retrieved);
            machine.advance(TurnState.RERANKED);

            const answerText = chunks.length === 0
                ? NO_PERMITTED_INFORMATION_ANSWER
                : await this.answerGenerator.generate(standaloneQuery, chunks, history);
            const citations = formatCitations(chunks);
            machine.advance(TurnState.ANSWERED);

            const turn = await this.chatMemoryService.recordTurn({
                sessionId,
                role: callerRole,
                userUtterance: utterance,
                standaloneQuery,
                retrievedChunkIds: chunks.map(chunk => chunk.chunkId),
                answerText,
                citations
            });
            machine.advance(TurnState.PERSISTED);

            return { sessionId, turnIndex: turn.turnIndex, standaloneQuery, answerText, citations };
        } catch (error) {
            const stage = machine.fail();
            if (error instanceof AccessDeniedError) {
                throw error;
            }
            this.logger.error(
                `Turn in session ${sessionId} failed during ${stage}: ${errorMessage(error)}`,
                error instanceof Error ? error.stack : undefined
            );
            throw new TurnFailedError(stage, sessionId, { cause: error });
        }
    }

    getSessionTurns(sessionId: string): Promise<ConversationTurn[]> {
        return this.chatMemoryService.getSessionTurns(sessionId);
    }
}
