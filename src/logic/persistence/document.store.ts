import { KnowledgeDocument } from '../../entities';
import { IngestionStatus, SourceType } from '../../utils/types';

export interface NewDocument {
    id: string;
    sourceType: SourceType;
    displayName: string;
    sourceUrl: string | null;
    ownerRoleOrigin: string | null;
}

export type DocumentPatch = Partial<{
    ingestionStatus: IngestionStatus;
    chunkCount: number;
    attempt: number;
    title: string | null;
    failureReason: string | null;
}>;

/** Metadata store for ingested documents. Chunks live in the vector index. */
export abstract class DocumentStore {
    abstract create(input: NewDocument): Promise<KnowledgeDocument>;
    abstract findById(id: string): Promise<KnowledgeDocument | null>;
    /** Newest first. */
    abstract list(sourceType?: SourceType): Promise<KnowledgeDocument[]>;
    /** Throws `DocumentNotFoundError` when the document is gone. */
    abstract update(id: string, patch: DocumentPatch): Promise<KnowledgeDocument>;
    abstract delete(id: string): Promise<boolean>;
}
