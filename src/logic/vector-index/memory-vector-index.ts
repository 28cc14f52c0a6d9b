import { Injectable } from '@nestjs/common';
import { Chunk } from '../../utils/types';
import { cosineSimilarity, ScoredChunk, SourcePredicate, VectorIndex } from './vector-index';

type Snapshot = ReadonlyMap<string, readonly Chunk[]>;

/**
 * Exact-search index held in process. Writers build a new snapshot and swap
 * the reference; a search holds on to whichever snapshot was current when it
 * started, so it never sees a half-applied write.
 */
@Injectable()
export class MemoryVectorIndex extends VectorIndex {
    private snapshot: Snapshot = new Map();

    async search(queryVector: number[], k: number, predicate?: SourcePredicate): Promise<ScoredChunk[]> {
        if (k <= 0) return [];
        const view = this.snapshot;
        const scored: ScoredChunk[] = [];
        for (const chunks of view.values()) {
            for (const chunk of chunks) {
                if (predicate && !predicate.sourceTypes.has(chunk.sourceType)) continue;
                if (chunk.embedding.length !== queryVector.length) continue;
                scored.push({ chunk, score: cosineSimilarity(queryVector, chunk.embedding) });
            }
        }
        // Array.prototype.sort is stable: equal scores keep insertion order.
        return scored.sort((a, b) => b.score - a.score).slice(0, k);
    }

    async upsert(chunk: Chunk): Promise<void> {
        const current = this.snapshot.get(chunk.documentId) ?? [];
        const position = current.findIndex(existing => existing.chunkId === chunk.chunkId);
        const updated = position === -1
            ? [...current, chunk]
            : current.map((existing, i) => (i === position ? chunk : existing));
        this.commit(chunk.documentId, updated);
    }

    async replaceDocument(documentId: string, chunks: Chunk[]): Promise<void> {
        const foreign = chunks.find(chunk => chunk.documentId !== documentId);
        if (foreign) {
            throw new Error(`Chunk ${foreign.chunkId} does not belong to document ${documentId}`);
        }
        this.commit(documentId, [...chunks]);
    }

    async delete(documentId: string): Promise<number> {
        const removed = this.snapshot.get(documentId)?.length ?? 0;
        this.commit(documentId, []);
        return removed;
    }

    /** Number of chunks currently indexed, optionally for one document. */
    size(documentId?: string): number {
        if (documentId !== undefined) {
            return this.snapshot.get(documentId)?.length ?? 0;
        }
        let total = 0;
        for (const chunks of this.snapshot.values()) total += chunks.length;
        return total;
    }

    private commit(documentId: string, chunks: readonly Chunk[]): void {
        const next = new Map(this.snapshot);
        if (chunks.length === 0) {
            next.delete(documentId);
        } else {
            next.set(documentId, chunks);
        }
        this.snapshot = next;
    }
}
