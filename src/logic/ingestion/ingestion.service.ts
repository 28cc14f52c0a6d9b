import { Inject, Injectable, Logger } from '@nestjs/common';
import pLimit from 'p-limit';
import { ragConfig, RagConfig } from '../../config/configuration';
import { KnowledgeDocument } from '../../entities';
import { errorMessage, IngestionCancelledError, IngestionError, IngestionInterruptedError } from '../../utils/errors';
import { normalizeText, splitIntoChunks } from '../../utils/textNormalizer';
import { withTimeout } from '../../utils/timeout';
import { Chunk, DocumentSource, IngestionStatus, IngestResult, LoadedDocument } from '../../utils/types';
import { EmbeddingModel } from '../gemini/model.ports';
import { DocumentLoader } from '../loaders/document-loader';
import { DocumentStore } from '../persistence/document.store';
import { VectorIndex } from '../vector-index/vector-index';
import { IngestionEventsService } from './ingestion-events.service';

type PendingChunk = Omit<Chunk, 'embedding'>;

export function chunkIdFor(documentId: string, attempt: number, seq: number): string {
    return `${documentId}__${attempt}__${seq}`;
}

/**
 * Runs one ingestion attempt for one document: load, chunk, embed, then swap
 * the document's chunk set in the vector index in a single call. Nothing is
 * written to the index until every chunk has its embedding, so a failed
 * attempt leaves the previous chunk set (or none) in place.
 *
 * Callers are expected to serialize attempts per document. A job aborted with
 * `IngestionInterruptedError` as the reason ends `failed`; any other abort
 * means the document is being deleted and nothing more is written.
 */
@Injectable()
export class IngestionService {
    private readonly logger = new Logger(IngestionService.name);

    constructor(
        @Inject(ragConfig.KEY) private readonly config: RagConfig,
        private readonly loader: DocumentLoader,
        private readonly embeddingModel: EmbeddingModel,
        private readonly vectorIndex: VectorIndex,
        private readonly documentStore: DocumentStore,
        private readonly events: IngestionEventsService,
    ) { }

    ingestSource(documentId: string, source: DocumentSource, signal?: AbortSignal): Promise<IngestResult> {
        return this.run(documentId, () => this.loader.load(source, signal), signal);
    }

    ingest(documentId: string, loaded: LoadedDocument, signal?: AbortSignal): Promise<IngestResult> {
        return this.run(documentId, async () => loaded, signal);
    }

    private async run(documentId: string, load: () => Promise<LoadedDocument>, signal?: AbortSignal): Promise<IngestResult> {
        const document = await this.documentStore.findById(documentId);
        if (document && signal?.reason instanceof IngestionInterruptedError) {
            return this.fail(documentId, document.attempt, signal.reason);
        }
        if (!document || signal?.aborted) {
            this.logger.warn(`Skipping ingestion of ${documentId}: document was deleted`);
            return { documentId, status: IngestionStatus.FAILED, attempt: document?.attempt ?? 0, chunkCount: 0, cancelled: true };
        }

        const attempt = document.attempt + 1;
        const processing = await this.documentStore.update(documentId, {
            ingestionStatus: IngestionStatus.PROCESSING,
            attempt,
            failureReason: null
        });
        this.events.publish({ documentId, status: IngestionStatus.PROCESSING, chunkCount: processing.chunkCount });
        this.logger.log(`Ingesting ${document.sourceType} document ${documentId} (attempt ${attempt})`);

        let indexed = false;
        try {
            const loaded = await this.loadWrapped(documentId, load);
            this.checkpoint(documentId, signal);

            const pending = this.toChunks(document, loaded, attempt);
            if (pending.length === 0) {
                throw new IngestionError(documentId, 'No extractable text');
            }
            const embeddings = await this.embed(documentId, pending.map(chunk => chunk.text), signal);
            const chunks = pending.map((chunk, i) => ({ ...chunk, embedding: embeddings[i] }));

            this.checkpoint(documentId, signal);
            await this.vectorIndex.replaceDocument(documentId, chunks);
            indexed = true;

            const ready = await this.documentStore.update(documentId, {
                ingestionStatus: IngestionStatus.READY,
                chunkCount: chunks.length,
                title: loaded.title ?? document.displayName
            });
            this.events.publish({ documentId, status: IngestionStatus.READY, chunkCount: ready.chunkCount });
            this.logger.log(`Document ${documentId} ready with ${chunks.length} chunks`);
            return { documentId, status: IngestionStatus.READY, attempt, chunkCount: chunks.length };
        } catch (error) {
            if (indexed) {
                // The new chunk set is live but the document could not be marked ready.
                const removed = await this.vectorIndex.delete(documentId);
                this.logger.warn(`Withdrew ${removed} chunks of ${documentId} after the ready update failed`);
                return this.fail(documentId, attempt, new IngestionError(documentId, `Could not record ready status: ${errorMessage(error)}`, { cause: error }), 0);
            }
            if (signal?.reason instanceof IngestionInterruptedError) {
                return this.fail(documentId, attempt, signal.reason);
            }
            if (error instanceof IngestionCancelledError || signal?.aborted) {
                this.logger.warn(`Ingestion of ${documentId} cancelled`);
                return { documentId, status: IngestionStatus.FAILED, attempt, chunkCount: 0, cancelled: true };
            }
            return this.fail(documentId, attempt, error);
        }
    }

    private async fail(documentId: string, attempt: number, error: unknown, chunkCount?: number): Promise<IngestResult> {
        const reason = errorMessage(error);
        this.logger.error(`Ingestion of ${documentId} failed: ${reason}`, error instanceof Error ? error.stack : undefined);

        const failed = await this.documentStore.update(documentId, {
            ingestionStatus: IngestionStatus.FAILED,
            failureReason: reason,
            ...(chunkCount === undefined ? {} : { chunkCount })
        });
        this.events.publish({ documentId, status: IngestionStatus.FAILED, chunkCount: failed.chunkCount, error: reason });
        return { documentId, status: IngestionStatus.FAILED, attempt, chunkCount: 0, error: reason };
    }

    private async loadWrapped(documentId: string, load: () => Promise<LoadedDocument>): Promise<LoadedDocument> {
        try {
            return await load();
        } catch (error) {
            if (error instanceof IngestionError) throw error;
            throw new IngestionError(documentId, `Could not load document: ${errorMessage(error)}`, { cause: error });
        }
    }

    private toChunks(document: KnowledgeDocument, loaded: LoadedDocument, attempt: number): PendingChunk[] {
        const chunks: PendingChunk[] = [];
        for (const section of loaded.sections) {
            const windows = splitIntoChunks(normalizeText(section.text), {
                chunkSize: this.config.chunkSize,
                overlap: this.config.chunkOverlap
            });
            for (const window of windows) {
                const seq = chunks.length;
                chunks.push({
                    chunkId: chunkIdFor(document.id, attempt, seq),
                    documentId: document.id,
                    sourceType: document.sourceType,
                    displayName: document.displayName,
                    location: section.location,
                    seq,
                    text: window.text
                });
            }
        }
        return chunks;
    }

    private async embed(documentId: string, texts: string[], signal?: AbortSignal): Promise<number[][]> {
        const batchSize = this.config.embedBatchSize;
        const batches: string[][] = [];
        for (let i = 0; i < texts.length; i += batchSize) {
            batches.push(texts.slice(i, i + batchSize));
        }

        const limit = pLimit(this.config.embedConcurrency);
        const results = await Promise.all(
            batches.map((batch, b) =>
                limit(async () => {
                    this.checkpoint(documentId, signal);
                    const vectors = await withTimeout(
                        batchSignal => this.embeddingModel.embedTexts(batch, batchSignal),
                        this.config.embedTimeoutMs,
                        () => new IngestionError(documentId, `Embedding batch ${b} timed out after ${this.config.embedTimeoutMs}ms`),
                        signal
                    ).catch((error: unknown) => {
                        if (error instanceof IngestionError) throw error;
                        throw new IngestionError(documentId, `Embedding failed: ${errorMessage(error)}`, { cause: error });
                    });
                    if (vectors.length !== batch.length) {
                        throw new IngestionError(documentId, `Embedding batch ${b} returned ${vectors.length} vectors for ${batch.length} chunks`);
                    }
                    return vectors;
                })
            )
        );

        const embeddings = results.flat();
        const dimensions = embeddings[0]?.length ?? 0;
        if (dimensions === 0 || embeddings.some(vector => vector.length !== dimensions)) {
            throw new IngestionError(documentId, 'Embedding model returned vectors of inconsistent length');
        }
        return embeddings;
    }

    private checkpoint(documentId: string, signal?: AbortSignal): void {
        if (signal?.aborted) {
            throw new IngestionCancelledError(documentId);
        }
    }
}
