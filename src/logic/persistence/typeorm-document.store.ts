import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { KnowledgeDocument } from '../../entities';
import { DocumentNotFoundError } from '../../utils/errors';
import { SourceType } from '../../utils/types';
import { DocumentPatch, DocumentStore, NewDocument } from './document.store';

@Injectable()
export class TypeOrmDocumentStore implements DocumentStore {
    constructor(
        @InjectRepository(KnowledgeDocument)
        private readonly documentRepository: Repository<KnowledgeDocument>,
    ) { }

    async create(input: NewDocument): Promise<KnowledgeDocument> {
        return this.documentRepository.save(this.documentRepository.create(input));
    }

    async findById(id: string): Promise<KnowledgeDocument | null> {
        return this.documentRepository.findOne({ where: { id } });
    }

    async list(sourceType?: SourceType): Promise<KnowledgeDocument[]> {
        return this.documentRepository.find({
            where: sourceType ? { sourceType } : {},
            order: { createdAt: 'DESC' }
        });
    }

    async update(id: string, patch: DocumentPatch): Promise<KnowledgeDocument> {
        await this.documentRepository.update(id, patch);
        const document = await this.findById(id);
        if (!document) {
            throw new DocumentNotFoundError(id);
        }
        return document;
    }

    async delete(id: string): Promise<boolean> {
        const result = await this.documentRepository.delete(id);
        return (result.affected ?? 0) > 0;
    }
}
