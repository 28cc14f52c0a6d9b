import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { ElasticConfig } from '../../config/configuration';
import { errorMessage } from '../../utils/errors';
import { Chunk, SourceType } from '../../utils/types';
import { ElasticService } from '../elastic/elastic.service';
import { ScoredChunk, SourcePredicate, VectorIndex } from './vector-index';

const chunkSourceSchema = z.object({
    chunk_id: z.string(),
    document_id: z.string(),
    source_type: z.nativeEnum(SourceType),
    display_name: z.string(),
    location: z.union([z.number(), z.string()]),
    seq: z.number(),
    text: z.string(),
});

const searchResponseSchema = z.object({
    hits: z.object({
        hits: z.array(z.object({
            _id: z.string(),
            _score: z.number().nullable(),
            _source: chunkSourceSchema,
        })),
    }),
});

const deleteByQuerySchema = z.object({ deleted: z.number() });
const acknowledgedSchema = z.object({ acknowledged: z.boolean() });

type ChunkSource = z.infer<typeof chunkSourceSchema>;

function toSource(chunk: Chunk, generation: string): ChunkSource & { embedding: number[]; generation: string } {
    return {
        chunk_id: chunk.chunkId,
        document_id: chunk.documentId,
        source_type: chunk.sourceType,
        display_name: chunk.displayName,
        location: chunk.location,
        seq: chunk.seq,
        text: chunk.text,
        embedding: chunk.embedding,
        generation,
    };
}

function fromSource(source: ChunkSource): Chunk {
    return {
        chunkId: source.chunk_id,
        documentId: source.document_id,
        sourceType: source.source_type,
        displayName: source.display_name,
        location: source.location,
        seq: source.seq,
        text: source.text,
        embedding: [],
    };
}

/**
 * Chunks stored as Elasticsearch documents with a `dense_vector` field.
 * Role filtering runs as the `filter` of the kNN clause, so it narrows the
 * candidate set before the top-k is taken.
 *
 * Every `replaceDocument` call writes its chunks under a fresh `generation`.
 * Searches from this process leave out generations still being written and,
 * once a write lands, every other generation of that document until the old
 * chunks are deleted.
 */
export class ElasticVectorIndex extends VectorIndex {
    private readonly logger = new Logger(ElasticVectorIndex.name);
    private readonly index: string;
    private indexReady?: Promise<void>;
    private readonly writing = new Set<string>();
    // documentId -> the generation that stays visible while the others are deleted
    private readonly retiring = new Map<string, string>();

    constructor(private readonly elasticService: ElasticService, private readonly config: ElasticConfig) {
        super();
        this.index = config.chunkIndex;
    }

    async search(queryVector: number[], k: number, predicate?: SourcePredicate): Promise<ScoredChunk[]> {
        if (k <= 0) return [];
        if (predicate && predicate.sourceTypes.size === 0) return [];
        await this.ensureIndex();

        const knn: Record<string, unknown> = {
            field: "embedding",
            query_vector: queryVector,
            k,
            num_candidates: Math.max(k * 10, 100)
        };
        const filter = this.searchFilter(predicate);
        if (filter) {
            knn.filter = filter;
        }

        const response = await this.elasticService.elasticPost(`/${this.index}/_search`, {
            knn,
            size: k,
            _source: { excludes: ["embedding"] }
        }, searchResponseSchema);

        return response.hits.hits
            .map(hit => ({ chunk: fromSource(hit._source), score: hit._score ?? 0 }))
            .sort((a, b) => b.score - a.score);
    }

    async upsert(chunk: Chunk): Promise<void> {
        await this.ensureIndex();
        await this.elasticService.elasticBulkSave([
            { index: { _index: this.index, _id: chunk.chunkId } },
            toSource(chunk, uuidv4())
        ]);
    }

    async replaceDocument(documentId: string, chunks: Chunk[]): Promise<void> {
        await this.ensureIndex();
        const generation = uuidv4();
        if (chunks.length > 0) {
            const bulk = chunks.flatMap(chunk => [
                { index: { _index: this.index, _id: chunk.chunkId } },
                toSource(chunk, generation)
            ]);
            this.writing.add(generation);
            try {
                await this.elasticService.elasticBulkSave(bulk);
            } catch (error) {
                // stays hidden if the rollback fails too
                this.logger.warn(`Rolling back partial write for ${documentId}: ${errorMessage(error)}`);
                await this.deleteWhere({ term: { generation } });
                this.writing.delete(generation);
                throw error;
            }
        }

        this.writing.delete(generation);
        this.retiring.set(documentId, generation);
        await this.deleteWhere({
            bool: {
                filter: [{ term: { document_id: documentId } }],
                must_not: [{ term: { generation } }]
            }
        });
        if (this.retiring.get(documentId) === generation) {
            this.retiring.delete(documentId);
        }
    }

    async delete(documentId: string): Promise<number> {
        await this.ensureIndex();
        const removed = await this.deleteWhere({ term: { document_id: documentId } });
        this.retiring.delete(documentId);
        return removed;
    }

    private searchFilter(predicate?: SourcePredicate): object | undefined {
        const allowed = predicate ? [{ terms: { source_type: Array.from(predicate.sourceTypes).sort() } }] : [];
        const hidden: object[] = [];
        if (this.writing.size > 0) {
            hidden.push({ terms: { generation: Array.from(this.writing).sort() } });
        }
        for (const [documentId, generation] of this.retiring) {
            hidden.push({
                bool: {
                    filter: [{ term: { document_id: documentId } }],
                    must_not: [{ term: { generation } }]
                }
            });
        }
        if (hidden.length === 0) {
            return allowed[0];
        }
        return { bool: { filter: allowed, must_not: hidden } };
    }

    private async deleteWhere(query: object): Promise<number> {
        const result = await this.elasticService.elasticPost(
            `/${this.index}/_delete_by_query?refresh=true&conflicts=proceed`,
            { query },
            deleteByQuerySchema
        );
        return result.deleted;
    }

    private ensureIndex(): Promise<void> {
        if (!this.indexReady) {
            this.indexReady = this.createIndexIfMissing().catch((error: unknown) => {
                this.indexReady = undefined;
                throw error;
            });
        }
        return this.indexReady;
    }

    private async createIndexIfMissing(): Promise<void> {
        if (await this.elasticService.elasticExists(`/${this.index}`)) {
            return;
        }
        await this.elasticService.elasticPut(`/${this.index}`, {
            mappings: {
                properties: {
                    chunk_id: { type: "keyword" },
                    document_id: { type: "keyword" },
                    source_type: { type: "keyword" },
                    display_name: { type: "keyword" },
                    location: { type: "keyword" },
                    seq: { type: "integer" },
                    generation: { type: "keyword" },
                    text: { type: "text" },
                    embedding: { type: "dense_vector", dims: this.config.dimensions, index: true, similarity: "cosine" }
                }
            }
        }, acknowledgedSchema);
        this.logger.log(`Created chunk index ${this.index}`);
    }
}
