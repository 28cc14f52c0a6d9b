import { Entity, PrimaryColumn, Column, CreateDateColumn, UpdateDateColumn, Index } from 'typeorm';
import { IngestionStatus, SourceType } from '../utils/types';

@Entity('knowledge_documents')
export class KnowledgeDocument {
  @PrimaryColumn({ type: 'varchar', length: 36 })
  id!: string;

  @Index()
  @Column({
    type: 'enum',
    enum: SourceType
  })
  sourceType!: SourceType;

  @Column({ length: 2048 })
  displayName!: string; // file name or URL

  // page URL for web documents; re-ingestion fetches it again
  @Column({ type: 'varchar', length: 2048, nullable: true })
  sourceUrl!: string | null;

  @Column({ type: 'varchar', nullable: true })
  title!: string | null;

  // who submitted it; informational only, never an access key
  @Column({ type: 'varchar', nullable: true })
  ownerRoleOrigin!: string | null;

  @Column({
    type: 'enum',
    enum: IngestionStatus,
    default: IngestionStatus.PENDING
  })
  ingestionStatus!: IngestionStatus;

  @Column({ default: 0 })
  chunkCount!: number;

  @Column({ default: 0 })
  attempt!: number;

  @Column({ type: 'text', nullable: true })
  failureReason!: string | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
