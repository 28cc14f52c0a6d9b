export interface ChatMessage {
    role: 'user' | 'assistant';
    content: string;
}

export interface CompletionOptions {
    temperature?: number;
    signal?: AbortSignal;
}

/** text -> fixed-length vector, one per input, same order. */
export abstract class EmbeddingModel {
    abstract embedTexts(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

/** Single-shot completion used by the rewriter, the answer generator and the relevance scorer. */
export abstract class ChatModel {
    abstract complete(system: string, user: string, history: ChatMessage[], options?: CompletionOptions): Promise<string>;
}
