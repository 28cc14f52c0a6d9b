import { Test, TestingModule } from '@nestjs/testing';
import { ragConfig } from '../../config/configuration';
import {
  ChatCall,
  InMemoryTurnStore,
  KeywordEmbeddingModel,
  never,
  ScriptedChatModel,
  ScriptedRerankModel,
  testRagConfig,
} from '../../testing/fakes';
import { AccessDeniedError, TurnFailedError } from '../../utils/errors';
import { Chunk, SourceType } from '../../utils/types';
import { ChatMemoryService } from '../chat-memory/chat-memory.service';
import { ConversationRewriterService } from '../chat-memory/conversation-rewriter.service';
import { REWRITE_SYSTEM } from '../chat-memory/prompts';
import { ChatModel, EmbeddingModel } from '../gemini/model.ports';
import { TurnStore } from '../persistence/turn.store';
import { RerankModel } from '../retrieval/rerank.model';
import { RerankerService } from '../retrieval/reranker.service';
import { RetrieverService } from '../retrieval/retriever.service';
import { MemoryVectorIndex } from '../vector-index/memory-vector-index';
import { VectorIndex } from '../vector-index/vector-index';
import { AnswerGeneratorService } from './answer-generator.service';
import { ChatService } from './chat.service';
import { NO_PERMITTED_INFORMATION_ANSWER } from './prompt';

const RETURNS_URL = 'https://example.test/returns';

describe('ChatService', () => {
  let service: ChatService;
  let embedding: KeywordEmbeddingModel;
  let chat: ScriptedChatModel;
  let turns: InMemoryTurnStore;
  let rewriteReply: (call: ChatCall) => Promise<string> | string;
  let scorer: (query: string, passages: string[]) => Promise<number[]> | number[];

  function webChunk(seq: number, text: string): Chunk {
    return {
      chunkId: `returns__1__${seq}`,
      documentId: 'returns',
      sourceType: SourceType.WEB,
      displayName: 'Returns FAQ',
      location: RETURNS_URL,
      seq,
      text,
      embedding: embedding.vectorFor(text),
    };
  }

  beforeEach(async () => {
    embedding = new KeywordEmbeddingModel(['refund', 'premium', 'shipping']);
    rewriteReply = () => 'What is the refund window for premium members?';
    scorer = (_query, passages) => passages.map(passage => (passage.includes('Premium') ? 0.9 : 0.1));
    chat = new ScriptedChatModel(call =>
      call.system === REWRITE_SYSTEM ? rewriteReply(call) : 'Refunds are accepted within 30 days [1].',
    );
    turns = new InMemoryTurnStore();

    const index = new MemoryVectorIndex();
    await index.replaceDocument('returns', [
      webChunk(0, 'Refund requests are accepted within 30 days of delivery.'),
      webChunk(1, 'Premium members get a refund window of 60 days.'),
    ]);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ChatService,
        ChatMemoryService,
        ConversationRewriterService,
        RetrieverService,
        RerankerService,
        AnswerGeneratorService,
        { provide: ragConfig.KEY, useValue: testRagConfig({ rerankTopN: 1, rewriteTimeoutMs: 20 }) },
        { provide: ChatModel, useValue: chat },
        { provide: EmbeddingModel, useValue: embedding },
        { provide: RerankModel, useValue: new ScriptedRerankModel((query, passages) => scorer(query, passages)) },
        { provide: VectorIndex, useValue: index },
        { provide: TurnStore, useValue: turns },
      ],
    }).compile();

    service = module.get<ChatService>(ChatService);
  });

  it('answers a full-access caller from web sources with citations', async () => {
    const result = await service.ask('s-full', 'full-access', 'What is the refund window?');

    expect(result).toEqual({
      sessionId: 's-full',
      turnIndex: 0,
      standaloneQuery: 'What is the refund window?',
      answerText: 'Refunds are accepted within 30 days [1].',
      citations: [{ displayName: 'Returns FAQ', location: RETURNS_URL, sourceType: SourceType.WEB }],
    });
    const [turn] = await turns.listBySession('s-full');
    expect(turn).toMatchObject({ role: 'full-access', retrievedChunkIds: ['returns__1__1'] });
    expect(chat.calls[0].user).toContain('[1] (https://example.test/returns)\nPremium members get a refund window of 60 days.');
  });

  it('tells a pdf-only caller nothing permitted was found when only web sources exist', async () => {
    const result = await service.ask('s-pdf', 'pdf-only', 'What is the refund window?');

    expect(result.answerText).toBe(NO_PERMITTED_INFORMATION_ANSWER);
    expect(result.citations).toEqual([]);
    expect(chat.calls).toEqual([]);
    const persisted = await turns.listBySession('s-pdf');
    expect(persisted).toHaveLength(1);
    expect(persisted[0].retrievedChunkIds).toEqual([]);
  });

  it('rewrites a follow-up into a standalone query before retrieval', async () => {
    await service.ask('s1', 'web-only', 'What is the refund window?');
    const second = await service.ask('s1', 'web-only', 'And for premium members?');

    const rewriteCall = chat.calls.find(call => call.system === REWRITE_SYSTEM);
    expect(rewriteCall?.user).toContain('What is the refund window?');
    expect(rewriteCall?.user).toContain('And for premium members?');
    expect(embedding.calls[embedding.calls.length - 1]).toEqual(['What is the refund window for premium members?']);
    expect(second.standaloneQuery).toBe('What is the refund window for premium members?');
    expect(second.turnIndex).toBe(1);
  });

  it('passes the first utterance of a session to retrieval unchanged', async () => {
    await service.ask('s1', 'web-only', 'What is the refund window?');
    expect(chat.calls.some(call => call.system === REWRITE_SYSTEM)).toBe(false);
    expect(embedding.calls).toEqual([['What is the refund window?']]);
  });

  it('aborts the turn without persisting it when the rewrite times out', async () => {
    await service.ask('s1', 'full-access', 'What is the refund window?');
    rewriteReply = () => never<string>();

    const failure = service.ask('s1', 'full-access', 'And for premium members?');

    await expect(failure).rejects.toBeInstanceOf(TurnFailedError);
    await expect(failure).rejects.toMatchObject({
      stage: 'rewrite',
      message: 'The assistant could not answer this question right now. Please try again.',
    });
    expect(await turns.listBySession('s1')).toHaveLength(1);
  });

  it('aborts the turn when retrieval fails', async () => {
    embedding.beforeEmbed = () => {
      throw new Error('embedding service unavailable');
    };

    await expect(service.ask('s2', 'full-access', 'What is the refund window?')).rejects.toMatchObject({ stage: 'retrieve' });
    expect(await turns.listBySession('s2')).toEqual([]);
  });

  it('keeps retrieval order when reranking fails', async () => {
    scorer = () => Promise.reject(new Error('rerank 503'));

    const result = await service.ask('s3', 'full-access', 'What is the refund window?');

    expect(result.answerText).toBe('Refunds are accepted within 30 days [1].');
    const [turn] = await turns.listBySession('s3');
    expect(turn.retrievedChunkIds).toEqual(['returns__1__0']);
  });

  it('reports a persistence failure as a failed turn', async () => {
    turns.failNextAppend = new Error('connection lost');
    await expect(service.ask('s4', 'full-access', 'What is the refund window?')).rejects.toMatchObject({ stage: 'persist' });
  });

  it('denies an unknown role before doing any work', async () => {
    await expect(service.ask('s5', 'manager', 'What is the refund window?')).rejects.toBeInstanceOf(AccessDeniedError);
    await expect(service.ask('s5', undefined, 'What is the refund window?')).rejects.toBeInstanceOf(AccessDeniedError);
    expect(embedding.calls).toEqual([]);
    expect(chat.calls).toEqual([]);
  });
});
