import { Module } from '@nestjs/common';
import { elasticConfig, ElasticConfig, ragConfig, RagConfig } from '../../config/configuration';
import { ElasticService } from '../elastic/elastic.service';
import { ElasticVectorIndex } from './elastic-vector-index';
import { MemoryVectorIndex } from './memory-vector-index';
import { VectorIndex } from './vector-index';

@Module({
    providers: [
        ElasticService,
        {
            provide: VectorIndex,
            inject: [ragConfig.KEY, elasticConfig.KEY, ElasticService],
            useFactory: (rag: RagConfig, elastic: ElasticConfig, elasticService: ElasticService): VectorIndex =>
                rag.vectorIndex === 'elastic'
                    ? new ElasticVectorIndex(elasticService, elastic)
                    : new MemoryVectorIndex(),
        },
    ],
    exports: [VectorIndex],
})
export class VectorIndexModule {}
