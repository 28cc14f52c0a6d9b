import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { QueryFailedError, Repository } from 'typeorm';
import { ConversationTurn } from '../../entities';
import { NewTurn, TurnStore } from './turn.store';

const MAX_APPEND_ATTEMPTS = 3;

function isDuplicateKey(error: unknown): boolean {
    if (!(error instanceof QueryFailedError)) return false;
    const driverError: unknown = error.driverError;
    return typeof driverError === 'object' && driverError !== null
        && 'code' in driverError && driverError.code === 'ER_DUP_ENTRY';
}

@Injectable()
export class TypeOrmTurnStore implements TurnStore {
    constructor(
        @InjectRepository(ConversationTurn)
        private readonly turnRepository: Repository<ConversationTurn>,
    ) { }

    // (sessionId, turnIndex) is unique; two concurrent turns of one session race
    // for the same index and the loser retries with the next one.
    async append(turn: NewTurn): Promise<ConversationTurn> {
        for (let attempt = 1; ; attempt++) {
            const last = await this.turnRepository.findOne({
                where: { sessionId: turn.sessionId },
                order: { turnIndex: 'DESC' }
            });
            const turnIndex = last ? last.turnIndex + 1 : 0;
            try {
                return await this.turnRepository.save(this.turnRepository.create({ ...turn, turnIndex }));
            } catch (error) {
                if (attempt < MAX_APPEND_ATTEMPTS && isDuplicateKey(error)) {
                    continue;
                }
                throw error;
            }
        }
    }

    async listBySession(sessionId: string, limit?: number): Promise<ConversationTurn[]> {
        if (limit === undefined) {
            return this.turnRepository.find({ where: { sessionId }, order: { turnIndex: 'ASC' } });
        }
        const recent = await this.turnRepository.find({
            where: { sessionId },
            order: { turnIndex: 'DESC' },
            take: limit
        });
        return recent.reverse();
    }
}
