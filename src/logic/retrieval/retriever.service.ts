import { Inject, Injectable, Logger } from '@nestjs/common';
import { ragConfig, RagConfig } from '../../config/configuration';
import { RetrievalTimeoutError } from '../../utils/errors';
import { withTimeout } from '../../utils/timeout';
import { RetrievedChunk } from '../../utils/types';
import { allowedSourceTypes, Role } from '../access-policy/access-policy';
import { EmbeddingModel } from '../gemini/model.ports';
import { VectorIndex } from '../vector-index/vector-index';

@Injectable()
export class RetrieverService {
    private readonly logger = new Logger(RetrieverService.name);

    constructor(
        @Inject(ragConfig.KEY) private readonly config: RagConfig,
        private readonly embeddingModel: EmbeddingModel,
        private readonly vectorIndex: VectorIndex,
    ) { }

    /**
     * Top-k chunks for the query among the source types the role may read.
     * The role filter is part of the search itself, so a restricted role
     * still gets up to k permitted chunks.
     */
    async retrieve(standaloneQuery: string, role: Role, k = this.config.retrievalTopK): Promise<RetrievedChunk[]> {
        const sourceTypes = allowedSourceTypes(role);
        if (sourceTypes.size === 0) {
            return [];
        }

        const [queryVector] = await withTimeout(
            signal => this.embeddingModel.embedTexts([standaloneQuery], signal),
            this.config.embedTimeoutMs,
            () => new RetrievalTimeoutError(this.config.embedTimeoutMs, 'query embedding')
        );
        if (!queryVector) {
            throw new Error('Embedding model returned no vector for the query');
        }

        const hits = await withTimeout(
            () => this.vectorIndex.search(queryVector, k, { sourceTypes }),
            this.config.searchTimeoutMs,
            () => new RetrievalTimeoutError(this.config.searchTimeoutMs, 'vector search')
        );
        this.logger.debug(`Retrieved ${hits.length} chunks for role ${role}`);
        return hits.map(hit => ({ ...hit.chunk, score: hit.score }));
    }
}
