import { ConversationTurn } from '../../entities';

export type NewTurn = Omit<ConversationTurn, 'id' | 'turnIndex' | 'createdAt'>;

/** Append-only log of conversation turns, one sequence per session. */
export abstract class TurnStore {
    /** Assigns the next `turnIndex` for the session. */
    abstract append(turn: NewTurn): Promise<ConversationTurn>;
    /** Turns in index order; with `limit`, only the most recent ones. */
    abstract listBySession(sessionId: string, limit?: number): Promise<ConversationTurn[]>;
}
