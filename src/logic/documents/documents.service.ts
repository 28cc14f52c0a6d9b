import { BeforeApplicationShutdown, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { KnowledgeDocument } from '../../entities';
import { DocumentNotFoundError, errorMessage, IngestionInterruptedError, InvalidSubmissionError } from '../../utils/errors';
import { KeyedSerialQueue } from '../../utils/keyed-queue';
import { DocumentSource, IngestionStatus, IngestResult, SourceType } from '../../utils/types';
import { IngestionEventsService } from '../ingestion/ingestion-events.service';
import { IngestionService } from '../ingestion/ingestion.service';
import { DocumentStore } from '../persistence/document.store';
import { VectorIndex } from '../vector-index/vector-index';

interface ActiveJobs {
    controller: AbortController;
    count: number;
}

function validateSource(source: DocumentSource): void {
    if (!source.displayName.trim()) {
        throw new InvalidSubmissionError('display name is required');
    }
    if (source.sourceType === SourceType.PDF) {
        if (source.data.byteLength === 0) {
            throw new InvalidSubmissionError('PDF upload is empty');
        }
        return;
    }
    let url: URL;
    try {
        url = new URL(source.url);
    } catch {
        throw new InvalidSubmissionError(`"${source.url}" is not a valid URL`);
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        throw new InvalidSubmissionError('only http and https URLs can be ingested');
    }
}

/**
 * Document lifecycle. Submissions return as soon as the record exists; the
 * ingestion job runs in the background. Jobs, re-ingestions and deletes of one
 * document go through a per-document queue, so they never overlap.
 */
@Injectable()
export class DocumentsService implements BeforeApplicationShutdown {
    private readonly logger = new Logger(DocumentsService.name);
    private readonly queue = new KeyedSerialQueue();
    private readonly active = new Map<string, ActiveJobs>();

    constructor(
        private readonly documentStore: DocumentStore,
        private readonly vectorIndex: VectorIndex,
        private readonly ingestionService: IngestionService,
        private readonly events: IngestionEventsService,
    ) { }

    async submitDocument(source: DocumentSource, ownerRoleOrigin: string | null = null): Promise<string> {
        validateSource(source);
        const document = await this.documentStore.create({
            id: uuidv4(),
            sourceType: source.sourceType,
            displayName: source.displayName,
            sourceUrl: source.sourceType === SourceType.WEB ? source.url : null,
            ownerRoleOrigin
        });
        this.events.publish({ documentId: document.id, status: IngestionStatus.PENDING, chunkCount: 0 });
        this.enqueue(document.id, source);
        return document.id;
    }

    /** Submits several sources at once. Every source is validated before any record is created. */
    async submitDocuments(sources: DocumentSource[], ownerRoleOrigin: string | null = null): Promise<string[]> {
        if (sources.length === 0) {
            throw new InvalidSubmissionError('nothing to submit');
        }
        sources.forEach(validateSource);
        const ids: string[] = [];
        for (const source of sources) {
            ids.push(await this.submitDocument(source, ownerRoleOrigin));
        }
        return ids;
    }

    /**
     * Re-runs ingestion. Web pages are fetched again when no new content is
     * given; a PDF needs its file.
     */
    async reingestDocument(documentId: string, content?: DocumentSource): Promise<KnowledgeDocument> {
        const document = await this.getDocument(documentId);
        const source = content ?? this.sourceFromRecord(document);
        if (source.sourceType !== document.sourceType) {
            throw new InvalidSubmissionError(`document ${documentId} is a ${document.sourceType} document`);
        }
        validateSource(source);

        // Checked and enqueued synchronously. The job waits for the `pending` write.
        const marked = this.isIngesting(documentId) ? Promise.resolve(document) : this.markPending(documentId);
        this.enqueue(documentId, source, marked);
        return marked;
    }

    async deleteDocument(documentId: string): Promise<void> {
        await this.getDocument(documentId);

        const jobs = this.active.get(documentId);
        if (jobs) {
            jobs.controller.abort();
            this.active.delete(documentId);
        }

        await this.queue.run(documentId, async () => {
            const removed = await this.vectorIndex.delete(documentId);
            await this.documentStore.delete(documentId);
            this.logger.log(`Deleted document ${documentId} and ${removed} chunks`);
        });
    }

    async getIngestionStatus(documentId: string): Promise<IngestionStatus> {
        const document = await this.getDocument(documentId);
        return document.ingestionStatus;
    }

    async getDocument(documentId: string): Promise<KnowledgeDocument> {
        const document = await this.documentStore.findById(documentId);
        if (!document) {
            throw new DocumentNotFoundError(documentId);
        }
        return document;
    }

    listDocuments(sourceType?: SourceType): Promise<KnowledgeDocument[]> {
        return this.documentStore.list(sourceType);
    }

    /** Resolves once every queued job of the document has settled. */
    drain(documentId: string): Promise<void> {
        return this.queue.whenIdle(documentId);
    }

    /** Runs before the database connection closes, so interrupted documents can still be marked failed. */
    async beforeApplicationShutdown(): Promise<void> {
        for (const jobs of this.active.values()) {
            jobs.controller.abort(new IngestionInterruptedError());
        }
        await this.queue.whenAllIdle();
    }

    private isIngesting(documentId: string): boolean {
        return (this.active.get(documentId)?.count ?? 0) > 0;
    }

    private async markPending(documentId: string): Promise<KnowledgeDocument> {
        const current = await this.documentStore.update(documentId, { ingestionStatus: IngestionStatus.PENDING });
        this.events.publish({ documentId, status: IngestionStatus.PENDING, chunkCount: current.chunkCount });
        return current;
    }

    private sourceFromRecord(document: KnowledgeDocument): DocumentSource {
        if (document.sourceType === SourceType.WEB && document.sourceUrl) {
            return { sourceType: SourceType.WEB, displayName: document.displayName, url: document.sourceUrl };
        }
        if (document.sourceType === SourceType.WEB) {
            throw new InvalidSubmissionError(`document ${document.id} has no stored URL`);
        }
        throw new InvalidSubmissionError('re-ingesting a PDF needs the file');
    }

    /** `after` gates the start of the job; a rejected `after` drops it. */
    private enqueue(documentId: string, source: DocumentSource, after: Promise<unknown> = Promise.resolve()): void {
        const jobs = this.active.get(documentId) ?? { controller: new AbortController(), count: 0 };
        jobs.count++;
        this.active.set(documentId, jobs);
        const signal = jobs.controller.signal;

        const job = async (): Promise<IngestResult> => {
            try {
                await after;
                return await this.ingestionService.ingestSource(documentId, source, signal);
            } finally {
                this.release(documentId, jobs);
            }
        };

        void this.queue.run(documentId, job).then(
            (result: IngestResult) => {
                this.logger.debug(`Job for ${documentId} finished: ${result.status}${result.cancelled ? ' (cancelled)' : ''}`);
            },
            (error: unknown) => {
                this.logger.error(`Ingestion job for ${documentId} did not run to completion: ${errorMessage(error)}`);
            }
        );
    }

    private release(documentId: string, jobs: ActiveJobs): void {
        jobs.count--;
        if (jobs.count === 0 && this.active.get(documentId) === jobs) {
            this.active.delete(documentId);
        }
    }
}
