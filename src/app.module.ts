import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { PipelineExceptionFilter } from './common/pipeline-exception.filter';
import { databaseConfig, DatabaseConfig, elasticConfig, geminiConfig, ragConfig } from './config/configuration';
import { validate } from './config/env.validation';
import { ConversationTurn, KnowledgeDocument } from './entities';
import { ChatModule } from './logic/chat/chat.module';
import { DocumentsModule } from './logic/documents/documents.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate,
      load: [ragConfig, geminiConfig, elasticConfig, databaseConfig],
    }),
    TypeOrmModule.forRootAsync({
      inject: [databaseConfig.KEY],
      useFactory: (db: DatabaseConfig) => ({
        type: 'mysql',
        host: db.host,
        port: db.port,
        username: db.username,
        password: db.password,
        database: db.database,
        entities: [KnowledgeDocument, ConversationTurn],
        synchronize: db.synchronize,
        logging: db.logging,
      }),
    }),
    DocumentsModule,
    ChatModule,
  ],
  providers: [{ provide: APP_FILTER, useClass: PipelineExceptionFilter }],
})
export class AppModule {}
