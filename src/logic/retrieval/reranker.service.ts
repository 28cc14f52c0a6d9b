import { Inject, Injectable, Logger } from '@nestjs/common';
import { ragConfig, RagConfig } from '../../config/configuration';
import { errorMessage } from '../../utils/errors';
import { withTimeout } from '../../utils/timeout';
import { RerankModel } from './rerank.model';

export interface RerankOutcome<T> {
    chunks: T[];
    /** True when scoring failed and `chunks` is the retrieval order cut to n. */
    degraded: boolean;
}

@Injectable()
export class RerankerService {
    private readonly logger = new Logger(RerankerService.name);

    constructor(
        @Inject(ragConfig.KEY) private readonly config: RagConfig,
        private readonly rerankModel: RerankModel,
    ) { }

    /**
     * Re-orders candidates by relevance score and keeps the best `topN`.
     * Equal scores keep retrieval order. A failed, late or malformed scoring
     * call falls back to the first `topN` in retrieval order.
     */
    async rerank<T extends { text: string }>(query: string, candidates: T[], topN = this.config.rerankTopN): Promise<RerankOutcome<T>> {
        if (candidates.length === 0) {
            return { chunks: [], degraded: false };
        }

        let scores: number[];
        try {
            scores = await withTimeout(
                signal => this.rerankModel.score(query, candidates.map(candidate => candidate.text), signal),
                this.config.rerankTimeoutMs,
                () => new Error(`rerank timed out after ${this.config.rerankTimeoutMs}ms`)
            );
            if (scores.length !== candidates.length || scores.some(score => !Number.isFinite(score))) {
                throw new Error(`expected ${candidates.length} finite scores, got ${JSON.stringify(scores)}`);
            }
        } catch (error) {
            this.logger.warn(`Rerank degraded, keeping retrieval order: ${errorMessage(error)}`);
            return { chunks: candidates.slice(0, topN), degraded: true };
        }

        const ranked = candidates
            .map((candidate, rank) => ({ candidate, rank, score: scores[rank] }))
            .sort((a, b) => b.score - a.score || a.rank - b.rank)
            .slice(0, topN)
            .map(entry => entry.candidate);
        return { chunks: ranked, degraded: false };
    }
}
