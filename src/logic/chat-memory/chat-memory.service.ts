import { Injectable } from '@nestjs/common';
import { ConversationTurn } from '../../entities';
import { NewTurn, TurnStore } from '../persistence/turn.store';

/** Session history backed by the turn log. */
@Injectable()
export class ChatMemoryService {
    constructor(private readonly turnStore: TurnStore) { }

    /** The last `limit` turns of the session, oldest first. */
    getRecentHistory(sessionId: string, limit: number): Promise<ConversationTurn[]> {
        return this.turnStore.listBySession(sessionId, limit);
    }

    getSessionTurns(sessionId: string): Promise<ConversationTurn[]> {
        return this.turnStore.listBySession(sessionId);
    }

    recordTurn(turn: NewTurn): Promise<ConversationTurn> {
        return this.turnStore.append(turn);
    }
}
