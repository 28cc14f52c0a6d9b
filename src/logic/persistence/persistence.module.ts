import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConversationTurn, KnowledgeDocument } from '../../entities';
import { DocumentStore } from './document.store';
import { TurnStore } from './turn.store';
import { TypeOrmDocumentStore } from './typeorm-document.store';
import { TypeOrmTurnStore } from './typeorm-turn.store';

@Module({
    imports: [TypeOrmModule.forFeature([KnowledgeDocument, ConversationTurn])],
    providers: [
        { provide: DocumentStore, useClass: TypeOrmDocumentStore },
        { provide: TurnStore, useClass: TypeOrmTurnStore },
    ],
    exports: [DocumentStore, TurnStore],
})
export class PersistenceModule {}
