import { Inject, Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { elasticConfig, ElasticConfig } from '../../config/configuration';

const bulkResponseSchema = z.object({
    errors: z.boolean(),
    items: z.array(z.record(z.unknown())).default([]),
});

export type BulkResponse = z.infer<typeof bulkResponseSchema>;

@Injectable()
export class ElasticService {
    private readonly logger = new Logger(ElasticService.name);
    private readonly headers: Record<string, string>;
    private readonly esUrl: string;
    private readonly timeoutMs: number;

    constructor(@Inject(elasticConfig.KEY) config: ElasticConfig) {
        this.esUrl = config.url.replace(/\/+$/, '');
        this.timeoutMs = config.timeoutMs;
        this.headers = {
            'Content-Type': 'application/json',
            'Authorization': `APIKey ${config.apiKey}`
        };
    }

    async elasticPost<T>(path: string, body: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
        const resp = await fetch(`${this.esUrl}${path}`, {
            method: "POST",
            headers: this.headers,
            body: JSON.stringify(body),
            signal: AbortSignal.timeout(this.timeoutMs)
        });
        if (!resp.ok) {
            const text = await resp.text();
            throw new Error(`Elasticsearch error ${resp.status}: ${text}`);
        }
        return schema.parse(await resp.json());
    }

    async elasticPut<T>(path: string, body: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
        const resp = await fetch(`${this.esUrl}${path}`, {
            method: "PUT",
            headers: this.headers,
            body: JSON.stringify(body),
            signal: AbortSignal.timeout(this.timeoutMs)
        });
        if (!resp.ok) {
            const text = await resp.text();
            throw new Error(`Elasticsearch put error ${resp.status}: ${text}`);
        }
        return schema.parse(await resp.json());
    }

    async elasticExists(path: string): Promise<boolean> {
        const resp = await fetch(`${this.esUrl}${path}`, {
            method: "HEAD",
            headers: this.headers,
            signal: AbortSignal.timeout(this.timeoutMs)
        });
        if (resp.status === 404) return false;
        if (!resp.ok) {
            throw new Error(`Elasticsearch head error ${resp.status}`);
        }
        return true;
    }

    /** `refresh` makes the written documents searchable before the call returns. */
    async elasticBulkSave(body: object[], refresh = true): Promise<BulkResponse> {
        const ndjson = body.map(line => JSON.stringify(line)).join("\n") + "\n";
        const resp = await fetch(`${this.esUrl}/_bulk${refresh ? '?refresh=wait_for' : ''}`, {
            method: "POST",
            headers: { ...this.headers, 'Content-Type': 'application/x-ndjson' },
            body: ndjson,
            signal: AbortSignal.timeout(this.timeoutMs)
        });
        if (!resp.ok) {
            const text = await resp.text();
            throw new Error(`Elasticsearch bulk error ${resp.status}: ${text}`);
        }
        const json = bulkResponseSchema.parse(await resp.json());
        if (json.errors) {
            this.logger.error(`Elasticsearch bulk errors: ${JSON.stringify(json.items)}`);
            throw new Error("Bulk insert failed");
        }
        return json;
    }
}
