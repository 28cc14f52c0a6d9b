import { Module } from '@nestjs/common';
import { GeminiModule } from '../gemini/gemini.module';
import { VectorIndexModule } from '../vector-index/vector-index.module';
import { GeminiRerankModel } from './gemini-rerank.model';
import { RerankModel } from './rerank.model';
import { RerankerService } from './reranker.service';
import { RetrieverService } from './retriever.service';

@Module({
    imports: [GeminiModule, VectorIndexModule],
    providers: [
        RetrieverService,
        RerankerService,
        GeminiRerankModel,
        { provide: RerankModel, useExisting: GeminiRerankModel },
    ],
    exports: [RetrieverService, RerankerService],
})
export class RetrievalModule {}
