import { Injectable } from '@nestjs/common';
import { z } from 'zod';
import { ChatModel } from '../gemini/model.ports';
import { buildRerankUser, RERANK_SYSTEM } from './prompts';
import { RerankModel } from './rerank.model';

const rerankResponseSchema = z.object({
    scores: z.array(z.object({
        index: z.number().int().nonnegative(),
        score: z.number(),
    })),
});

export function parseRerankScores(raw: string, passageCount: number): number[] {
    const parsed: unknown = JSON.parse(raw.trim().replace(/^```(?:json)?\s*|\s*```$/g, ''));
    const { scores } = rerankResponseSchema.parse(parsed);
    const byIndex = new Map(scores.map(entry => [entry.index, entry.score]));
    // passages the model skipped rank last
    return Array.from({ length: passageCount }, (_, index) => byIndex.get(index) ?? 0);
}

/** Relevance scoring through the chat model, asked for JSON scores. */
@Injectable()
export class GeminiRerankModel extends RerankModel {
    constructor(private readonly chatModel: ChatModel) {
        super();
    }

    async score(query: string, passages: string[], signal?: AbortSignal): Promise<number[]> {
        if (passages.length === 0) return [];
        const raw = await this.chatModel.complete(RERANK_SYSTEM, buildRerankUser(query, passages), [], { temperature: 0, signal });
        return parseRerankScores(raw, passages.length);
    }
}
