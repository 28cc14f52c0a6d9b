export enum SourceType {
    PDF = 'pdf',
    WEB = 'web',
}

export enum IngestionStatus {
    PENDING = 'pending',
    PROCESSING = 'processing',
    READY = 'ready',
    FAILED = 'failed',
}

/** Page number (1-indexed) for pdf chunks, source URL for web chunks. */
export type ChunkLocation = number | string;

export interface Chunk {
    chunkId: string;
    documentId: string;
    sourceType: SourceType;
    displayName: string;
    location: ChunkLocation;
    seq: number;
    text: string;
    embedding: number[];
}

export type RetrievedChunk = Chunk & { score: number };

export interface Citation {
    displayName: string;
    location: ChunkLocation;
    sourceType: SourceType;
}

export type DocumentSource =
    | { sourceType: SourceType.PDF; displayName: string; data: Uint8Array }
    | { sourceType: SourceType.WEB; displayName: string; url: string };

export interface LoadedSection {
    text: string;
    location: ChunkLocation;
}

export interface LoadedDocument {
    title?: string;
    sections: LoadedSection[];
}

export interface IngestResult {
    documentId: string;
    status: IngestionStatus.READY | IngestionStatus.FAILED;
    attempt: number;
    chunkCount: number;
    error?: string;
    cancelled?: boolean;
}

export interface IngestionEvent {
    documentId: string;
    status: IngestionStatus;
    chunkCount: number;
    error?: string;
}

export interface AskResult {
    sessionId: string;
    turnIndex: number;
    standaloneQuery: string;
    answerText: string;
    citations: Citation[];
}
