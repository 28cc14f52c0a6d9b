import { z } from 'zod';
import { LogLevel } from '@nestjs/common';

const bool = z.enum(['true', 'false']).default('false').transform(value => value === 'true');
const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const envSchema = z
    .object({
        NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
        PORT: positiveInt(8787),
        LOG_LEVEL: z.enum(['error', 'warn', 'log', 'debug', 'verbose']).default('log'),

        GEMINI_API_KEY: z.string().default(''),
        GEMINI_EMBED_MODEL: z.string().min(1).default('text-embedding-004'),
        GEMINI_CHAT_MODEL: z.string().min(1).default('gemini-2.5-flash-lite'),

        VECTOR_INDEX: z.enum(['memory', 'elastic']).default('memory'),
        ELASTIC_URL: z.string().default('http://localhost:9200'),
        ELASTIC_API_KEY: z.string().default(''),
        ELASTIC_CHUNK_INDEX: z.string().min(1).default('rag_chunks'),
        ELASTIC_TIMEOUT_MS: positiveInt(5000),
        EMBEDDING_DIMENSIONS: positiveInt(768),

        DB_HOST: z.string().default('localhost'),
        DB_PORT: positiveInt(3306),
        DB_USERNAME: z.string().default('root'),
        DB_PASSWORD: z.string().default(''),
        DB_DATABASE: z.string().default('scoped_rag'),
        DB_SYNCHRONIZE: bool,

        CHUNK_SIZE: positiveInt(1000),
        CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(150),
        RETRIEVAL_TOP_K: positiveInt(10),
        RERANK_TOP_N: positiveInt(4),
        REWRITE_HISTORY_TURNS: positiveInt(6),
        EMBED_BATCH_SIZE: positiveInt(16),
        EMBED_CONCURRENCY: positiveInt(4),

        EMBED_TIMEOUT_MS: positiveInt(15000),
        SEARCH_TIMEOUT_MS: positiveInt(5000),
        REWRITE_TIMEOUT_MS: positiveInt(10000),
        RERANK_TIMEOUT_MS: positiveInt(8000),
        GENERATION_TIMEOUT_MS: positiveInt(30000),
        WEB_FETCH_TIMEOUT_MS: positiveInt(10000),
    })
    .superRefine((env, ctx) => {
        if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['CHUNK_OVERLAP'], message: 'must be smaller than CHUNK_SIZE' });
        }
        if (env.RETRIEVAL_TOP_K <= env.RERANK_TOP_N) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['RETRIEVAL_TOP_K'], message: 'must be larger than RERANK_TOP_N' });
        }
    });

export type Env = z.infer<typeof envSchema>;

export function parseEnv(raw: Record<string, unknown>): Env {
    const result = envSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new Error(`Invalid environment configuration: ${issues.join('; ')}`);
    }
    return result.data;
}

/** `ConfigModule.forRoot({ validate })` hook. */
export function validate(config: Record<string, unknown>): Env {
    return parseEnv(config);
}

const LEVELS: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

export function logLevelsUpTo(level: Env['LOG_LEVEL']): LogLevel[] {
    return LEVELS.slice(0, LEVELS.indexOf(level) + 1);
}
