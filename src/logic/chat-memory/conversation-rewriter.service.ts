import { Inject, Injectable, Logger } from '@nestjs/common';
import { ragConfig, RagConfig } from '../../config/configuration';
import { ConversationTurn } from '../../entities';
import { RewriteTimeoutError } from '../../utils/errors';
import { withTimeout } from '../../utils/timeout';
import { ChatModel } from '../gemini/model.ports';
import { buildRewriteUser, REWRITE_SYSTEM } from './prompts';

export type HistoryTurn = Pick<ConversationTurn, 'userUtterance' | 'answerText'>;

@Injectable()
export class ConversationRewriterService {
    private readonly logger = new Logger(ConversationRewriterService.name);

    constructor(
        @Inject(ragConfig.KEY) private readonly config: RagConfig,
        private readonly chatModel: ChatModel,
    ) { }

    /**
     * Standalone form of `utterance` given the prior turns (oldest first).
     * The first turn of a session is returned as is, without a model call.
     */
    async rewrite(utterance: string, history: HistoryTurn[]): Promise<string> {
        if (history.length === 0) {
            return utterance;
        }

        const window = history.slice(-this.config.rewriteHistoryTurns);
        const raw = await withTimeout(
            signal => this.chatModel.complete(REWRITE_SYSTEM, buildRewriteUser(window, utterance), [], { temperature: 0, signal }),
            this.config.rewriteTimeoutMs,
            () => new RewriteTimeoutError(this.config.rewriteTimeoutMs)
        );

        const standalone = raw.trim().replace(/^"(.*)"$/s, '$1').trim();
        if (!standalone) {
            this.logger.warn('Rewrite returned nothing, using the utterance as is');
            return utterance;
        }
        return standalone;
    }
}
