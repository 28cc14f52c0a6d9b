import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index } from 'typeorm';
import { Citation } from '../utils/types';

@Entity('conversation_turns')
@Index(['sessionId', 'turnIndex'], { unique: true })
export class ConversationTurn {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column()
  sessionId!: string;

  @Column()
  turnIndex!: number;

  @Column()
  role!: string;

  @Column('text')
  userUtterance!: string;

  @Column('text')
  standaloneQuery!: string;

  @Column('json')
  retrievedChunkIds!: string[]; // post-rerank order

  @Column('text')
  answerText!: string;

  @Column('json')
  citations!: Citation[];

  @CreateDateColumn()
  createdAt!: Date;
}
