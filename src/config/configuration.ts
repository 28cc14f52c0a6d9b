import { ConfigType, registerAs } from '@nestjs/config';
import { parseEnv } from './env.validation';

export const ragConfig = registerAs('rag', () => {
    const env = parseEnv(process.env);
    return {
        vectorIndex: env.VECTOR_INDEX,
        chunkSize: env.CHUNK_SIZE,
        chunkOverlap: env.CHUNK_OVERLAP,
        retrievalTopK: env.RETRIEVAL_TOP_K,
        rerankTopN: env.RERANK_TOP_N,
        rewriteHistoryTurns: env.REWRITE_HISTORY_TURNS,
        embedBatchSize: env.EMBED_BATCH_SIZE,
        embedConcurrency: env.EMBED_CONCURRENCY,
        embedTimeoutMs: env.EMBED_TIMEOUT_MS,
        searchTimeoutMs: env.SEARCH_TIMEOUT_MS,
        rewriteTimeoutMs: env.REWRITE_TIMEOUT_MS,
        rerankTimeoutMs: env.RERANK_TIMEOUT_MS,
        generationTimeoutMs: env.GENERATION_TIMEOUT_MS,
        webFetchTimeoutMs: env.WEB_FETCH_TIMEOUT_MS,
    };
});

export const geminiConfig = registerAs('gemini', () => {
    const env = parseEnv(process.env);
    return {
        apiKey: env.GEMINI_API_KEY,
        embedModel: env.GEMINI_EMBED_MODEL,
        chatModel: env.GEMINI_CHAT_MODEL,
    };
});

export const elasticConfig = registerAs('elastic', () => {
    const env = parseEnv(process.env);
    return {
        url: env.ELASTIC_URL,
        apiKey: env.ELASTIC_API_KEY,
        chunkIndex: env.ELASTIC_CHUNK_INDEX,
        dimensions: env.EMBEDDING_DIMENSIONS,
        timeoutMs: env.ELASTIC_TIMEOUT_MS,
    };
});

export const databaseConfig = registerAs('database', () => {
    const env = parseEnv(process.env);
    return {
        host: env.DB_HOST,
        port: env.DB_PORT,
        username: env.DB_USERNAME,
        password: env.DB_PASSWORD,
        database: env.DB_DATABASE,
        synchronize: env.DB_SYNCHRONIZE,
        logging: env.NODE_ENV === 'development',
    };
});

export type RagConfig = ConfigType<typeof ragConfig>;
export type GeminiConfig = ConfigType<typeof geminiConfig>;
export type ElasticConfig = ConfigType<typeof elasticConfig>;
export type DatabaseConfig = ConfigType<typeof databaseConfig>;
