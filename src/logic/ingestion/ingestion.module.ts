import { Module } from '@nestjs/common';
import { GeminiModule } from '../gemini/gemini.module';
import { LoadersModule } from '../loaders/loaders.module';
import { PersistenceModule } from '../persistence/persistence.module';
import { VectorIndexModule } from '../vector-index/vector-index.module';
import { IngestionEventsService } from './ingestion-events.service';
import { IngestionService } from './ingestion.service';

@Module({
    imports: [GeminiModule, LoadersModule, PersistenceModule, VectorIndexModule],
    providers: [IngestionService, IngestionEventsService],
    exports: [IngestionService, IngestionEventsService],
})
export class IngestionModule {}
