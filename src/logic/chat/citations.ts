import { Citation, RetrievedChunk } from '../../utils/types';

/** One citation per (display name, location), first occurrence wins. */
export function formatCitations(chunks: readonly RetrievedChunk[]): Citation[] {
    const seen = new Set<string>();
    const citations: Citation[] = [];
    for (const chunk of chunks) {
        const key = JSON.stringify([chunk.displayName, chunk.location]);
        if (seen.has(key)) continue;
        seen.add(key);
        citations.push({ displayName: chunk.displayName, location: chunk.location, sourceType: chunk.sourceType });
    }
    return citations;
}
