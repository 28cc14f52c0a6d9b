import { PipelineStage } from '../../utils/errors';

export enum TurnState {
    RECEIVED = 'received',
    REWRITTEN = 'rewritten',
    RETRIEVED = 'retrieved',
    RERANKED = 'reranked',
    ANSWERED = 'answered',
    PERSISTED = 'persisted',
    FAILED = 'failed',
}

const NEXT: Readonly<Record<TurnState, TurnState | null>> = {
    [TurnState.RECEIVED]: TurnState.REWRITTEN,
    [TurnState.REWRITTEN]: TurnState.RETRIEVED,
    [TurnState.RETRIEVED]: TurnState.RERANKED,
    [TurnState.RERANKED]: TurnState.ANSWERED,
    [TurnState.ANSWERED]: TurnState.PERSISTED,
    [TurnState.PERSISTED]: null,
    [TurnState.FAILED]: null,
};

// The stage that runs while the turn sits in a state.
const PENDING_STAGE: Readonly<Partial<Record<TurnState, PipelineStage>>> = {
    [TurnState.RECEIVED]: 'rewrite',
    [TurnState.REWRITTEN]: 'retrieve',
    [TurnState.RETRIEVED]: 'rerank',
    [TurnState.RERANKED]: 'generate',
    [TurnState.ANSWERED]: 'persist',
};

export type TransitionListener = (from: TurnState, to: TurnState) => void;

/**
 * Linear lifecycle of one query turn. Each state may only move to the next
 * one, or to FAILED; PERSISTED and FAILED are terminal.
 */
export class TurnStateMachine {
    private current = TurnState.RECEIVED;
    private readonly visited: TurnState[] = [TurnState.RECEIVED];

    constructor(private readonly onTransition?: TransitionListener) { }

    get state(): TurnState {
        return this.current;
    }

    get trail(): readonly TurnState[] {
        return this.visited;
    }

    get pendingStage(): PipelineStage | undefined {
        return PENDING_STAGE[this.current];
    }

    get isTerminal(): boolean {
        return NEXT[this.current] === null;
    }

    advance(to: TurnState): void {
        if (NEXT[this.current] !== to) {
            throw new Error(`Illegal turn transition ${this.current} -> ${to}`);
        }
        this.move(to);
    }

    /** Moves to FAILED and returns the stage that was running. */
    fail(): PipelineStage {
        const stage = this.pendingStage;
        if (stage === undefined) {
            throw new Error(`Cannot fail a turn in state ${this.current}`);
        }
        this.move(TurnState.FAILED);
        return stage;
    }

    private move(to: TurnState): void {
        const from = this.current;
        this.current = to;
        this.visited.push(to);
        this.onTransition?.(from, to);
    }
}
