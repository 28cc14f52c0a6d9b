import { Chunk, SourceType } from '../../utils/types';

/** Metadata filter applied inside the similarity search, never after it. */
export interface SourcePredicate {
    sourceTypes: ReadonlySet<SourceType>;
}

export interface ScoredChunk {
    chunk: Chunk;
    score: number;
}

export abstract class VectorIndex {
    /**
     * At most `k` chunks admitted by `predicate`, in non-increasing score order.
     * A predicate that admits nothing yields an empty list.
     */
    abstract search(queryVector: number[], k: number, predicate?: SourcePredicate): Promise<ScoredChunk[]>;
    abstract upsert(chunk: Chunk): Promise<void>;
    /** Swaps a document's whole chunk set; searches see the old set or the new one, never a mix. */
    abstract replaceDocument(documentId: string, chunks: Chunk[]): Promise<void>;
    /** Removes every chunk of the document and returns how many were removed. */
    abstract delete(documentId: string): Promise<number>;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
    if (a.length !== b.length || a.length === 0) return 0;
    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
        dot += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }
    if (normA === 0 || normB === 0) return 0;
    return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
