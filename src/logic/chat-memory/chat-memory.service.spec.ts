import { Test, TestingModule } from '@nestjs/testing';
import { InMemoryTurnStore } from '../../testing/fakes';
import { SourceType } from '../../utils/types';
import { TurnStore } from '../persistence/turn.store';
import { ChatMemoryService } from './chat-memory.service';

describe('ChatMemoryService', () => {
  let service: ChatMemoryService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [ChatMemoryService, { provide: TurnStore, useValue: new InMemoryTurnStore() }],
    }).compile();

    service = module.get<ChatMemoryService>(ChatMemoryService);
  });

  function record(sessionId: string, userUtterance: string) {
    return service.recordTurn({
      sessionId,
      role: 'full-access',
      userUtterance,
      standaloneQuery: userUtterance,
      retrievedChunkIds: [],
      answerText: `answer to ${userUtterance}`,
      citations: [{ displayName: 'faq', location: 'https://example.test/faq', sourceType: SourceType.WEB }],
    });
  }

  it('numbers turns per session', async () => {
    expect((await record('s1', 'one')).turnIndex).toBe(0);
    expect((await record('s2', 'other')).turnIndex).toBe(0);
    expect((await record('s1', 'two')).turnIndex).toBe(1);
  });

  it('returns the most recent turns oldest first', async () => {
    for (const utterance of ['one', 'two', 'three']) {
      await record('s1', utterance);
    }

    const recent = await service.getRecentHistory('s1', 2);
    expect(recent.map(turn => turn.userUtterance)).toEqual(['two', 'three']);
    const all = await service.getSessionTurns('s1');
    expect(all.map(turn => turn.turnIndex)).toEqual([0, 1, 2]);
  });
});
