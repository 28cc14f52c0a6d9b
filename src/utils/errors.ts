export type PipelineStage = 'rewrite' | 'retrieve' | 'rerank' | 'generate' | 'persist';

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/** Loader, embedding or index failure while ingesting one document. */
export class IngestionError extends Error {
    constructor(readonly documentId: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'IngestionError';
    }
}

/** The document was deleted while its ingestion job was still running. */
export class IngestionCancelledError extends Error {
    constructor(readonly documentId: string) {
        super(`Ingestion of ${documentId} was cancelled`);
        this.name = 'IngestionCancelledError';
    }
}

/** The service stopped while the document was queued or being ingested. */
export class IngestionInterruptedError extends Error {
    constructor() {
        super('interrupted');
        this.name = 'IngestionInterruptedError';
    }
}

export class AccessDeniedError extends Error {
    constructor(readonly role: string) {
        super(`Role "${role}" is not allowed to query the knowledge base`);
        this.name = 'AccessDeniedError';
    }
}

export class StageTimeoutError extends Error {
    constructor(readonly stage: PipelineStage, readonly timeoutMs: number, detail?: string) {
        super(`${stage} stage timed out after ${timeoutMs}ms${detail ? ` (${detail})` : ''}`);
        this.name = 'StageTimeoutError';
    }
}

export class RewriteTimeoutError extends StageTimeoutError {
    constructor(timeoutMs: number) {
        super('rewrite', timeoutMs);
        this.name = 'RewriteTimeoutError';
    }
}

export class RetrievalTimeoutError extends StageTimeoutError {
    constructor(timeoutMs: number, detail: string) {
        super('retrieve', timeoutMs, detail);
        this.name = 'RetrievalTimeoutError';
    }
}

/**
 * Raised to callers when a turn is aborted. The message is deliberately generic;
 * the failing stage and the internal cause are kept for logging only.
 */
export class TurnFailedError extends Error {
    constructor(readonly stage: PipelineStage, readonly sessionId: string, options?: { cause?: unknown }) {
        super('The assistant could not answer this question right now. Please try again.', options);
        this.name = 'TurnFailedError';
    }
}

export class DocumentNotFoundError extends Error {
    constructor(readonly documentId: string) {
        super(`Document ${documentId} not found`);
        this.name = 'DocumentNotFoundError';
    }
}

export class InvalidSubmissionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidSubmissionError';
    }
}
