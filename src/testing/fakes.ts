import { RagConfig } from '../config/configuration';
import { ConversationTurn, KnowledgeDocument } from '../entities';
import { ChatMessage, ChatModel, EmbeddingModel } from '../logic/gemini/model.ports';
import { DocumentLoader } from '../logic/loaders/document-loader';
import { DocumentPatch, DocumentStore, NewDocument } from '../logic/persistence/document.store';
import { NewTurn, TurnStore } from '../logic/persistence/turn.store';
import { RerankModel } from '../logic/retrieval/rerank.model';
import { DocumentNotFoundError } from '../utils/errors';
import { DocumentSource, IngestionStatus, LoadedDocument, SourceType } from '../utils/types';

export function testRagConfig(overrides: Partial<RagConfig> = {}): RagConfig {
    return {
        vectorIndex: 'memory',
        chunkSize: 1000,
        chunkOverlap: 150,
        retrievalTopK: 10,
        rerankTopN: 4,
        rewriteHistoryTurns: 6,
        embedBatchSize: 16,
        embedConcurrency: 4,
        embedTimeoutMs: 1000,
        searchTimeoutMs: 1000,
        rewriteTimeoutMs: 1000,
        rerankTimeoutMs: 1000,
        generationTimeoutMs: 1000,
        webFetchTimeoutMs: 1000,
        ...overrides,
    };
}

/** Never settles; stands in for a dependency that hangs. */
export function never<T>(): Promise<T> {
    return new Promise<T>(() => undefined);
}

/** A promise plus the function that settles it, for holding a fake mid-call. */
export function gate(): { opened: Promise<void>; open: () => void } {
    let open: () => void = () => undefined;
    const opened = new Promise<void>(resolve => {
        open = resolve;
    });
    return { opened, open };
}

/**
 * Bag-of-words embedding over a fixed vocabulary: dimension i counts the
 * occurrences of `vocabulary[i]` in the lower-cased text.
 */
export class KeywordEmbeddingModel extends EmbeddingModel {
    readonly calls: string[][] = [];
    beforeEmbed?: (texts: string[]) => Promise<void> | void;

    constructor(private readonly vocabulary: string[]) {
        super();
    }

    async embedTexts(texts: string[]): Promise<number[][]> {
        this.calls.push([...texts]);
        await this.beforeEmbed?.(texts);
        return texts.map(text => this.vectorFor(text));
    }

    vectorFor(text: string): number[] {
        const lower = text.toLowerCase();
        return this.vocabulary.map(term => lower.split(term.toLowerCase()).length - 1);
    }
}

export interface ChatCall {
    system: string;
    user: string;
    history: ChatMessage[];
}

export class ScriptedChatModel extends ChatModel {
    readonly calls: ChatCall[] = [];

    constructor(private readonly reply: (call: ChatCall) => Promise<string> | string) {
        super();
    }

    async complete(system: string, user: string, history: ChatMessage[]): Promise<string> {
        const call = { system, user, history };
        this.calls.push(call);
        return this.reply(call);
    }
}

export class ScriptedRerankModel extends RerankModel {
    readonly calls: { query: string; passages: string[] }[] = [];

    constructor(private readonly scorer: (query: string, passages: string[]) => Promise<number[]> | number[]) {
        super();
    }

    async score(query: string, passages: string[]): Promise<number[]> {
        this.calls.push({ query, passages: [...passages] });
        return this.scorer(query, passages);
    }
}

/** Resolves PDFs by display name and web pages by URL; an `Error` entry makes that load fail. */
export class FakeDocumentLoader extends DocumentLoader {
    readonly loaded: string[] = [];

    constructor(private readonly documents: Record<string, LoadedDocument | Error>) {
        super();
    }

    async load(source: DocumentSource): Promise<LoadedDocument> {
        const key = source.sourceType === SourceType.WEB ? source.url : source.displayName;
        this.loaded.push(key);
        const entry = this.documents[key];
        if (entry === undefined) {
            throw new Error(`No fixture for ${key}`);
        }
        if (entry instanceof Error) {
            throw entry;
        }
        return entry;
    }
}

function copyDocument(document: KnowledgeDocument): KnowledgeDocument {
    return Object.assign(new KnowledgeDocument(), document);
}

export class InMemoryDocumentStore extends DocumentStore {
    private readonly rows = new Map<string, KnowledgeDocument>();

    async create(input: NewDocument): Promise<KnowledgeDocument> {
        const now = new Date();
        const document = Object.assign(new KnowledgeDocument(), {
            ...input,
            title: null,
            ingestionStatus: IngestionStatus.PENDING,
            chunkCount: 0,
            attempt: 0,
            failureReason: null,
            createdAt: now,
            updatedAt: now,
        });
        this.rows.set(document.id, document);
        return copyDocument(document);
    }

    async findById(id: string): Promise<KnowledgeDocument | null> {
        const document = this.rows.get(id);
        return document ? copyDocument(document) : null;
    }

    async list(sourceType?: SourceType): Promise<KnowledgeDocument[]> {
        return Array.from(this.rows.values())
            .filter(document => sourceType === undefined || document.sourceType === sourceType)
            .reverse()
            .map(copyDocument);
    }

    async update(id: string, patch: DocumentPatch): Promise<KnowledgeDocument> {
        const document = this.rows.get(id);
        if (!document) {
            throw new DocumentNotFoundError(id);
        }
        Object.assign(document, patch, { updatedAt: new Date() });
        return copyDocument(document);
    }

    async delete(id: string): Promise<boolean> {
        return this.rows.delete(id);
    }
}

export class InMemoryTurnStore extends TurnStore {
    private readonly turns: ConversationTurn[] = [];
    failNextAppend?: Error;

    async append(turn: NewTurn): Promise<ConversationTurn> {
        if (this.failNextAppend) {
            const error = this.failNextAppend;
            this.failNextAppend = undefined;
            throw error;
        }
        const turnIndex = this.turns.filter(existing => existing.sessionId === turn.sessionId).length;
        const stored = Object.assign(new ConversationTurn(), {
            ...turn,
            id: `turn-${this.turns.length + 1}`,
            turnIndex,
            createdAt: new Date(),
        });
        this.turns.push(stored);
        return Object.assign(new ConversationTurn(), stored);
    }

    async listBySession(sessionId: string, limit?: number): Promise<ConversationTurn[]> {
        const session = this.turns
            .filter(turn => turn.sessionId === sessionId)
            .map(turn => Object.assign(new ConversationTurn(), turn));
        return limit === undefined ? session : session.slice(-limit);
    }
}
