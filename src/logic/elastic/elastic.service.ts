import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { AppConfig } from '../../config/configuration';
import { ProviderError, describeError } from '../../utils/errors';

type HttpMethod = 'POST' | 'PUT' | 'HEAD';

const bulkResponseSchema = z.object({
    errors: z.boolean(),
    items: z.array(z.record(z.object({ error: z.unknown().optional() }).passthrough())).default([]),
});

@Injectable()
export class ElasticService {
    private readonly logger = new Logger(ElasticService.name);
    private readonly headers: Record<string, string>;
    private readonly esUrl: string;

    constructor(private readonly configService: ConfigService<AppConfig, true>) {
        this.esUrl = this.configService.get('ELASTIC_URL', { infer: true }).replace(/\/+$/, '');
        const apiKey = this.configService.get('ELASTIC_API_KEY', { infer: true });
        this.headers = {
            'Content-Type': 'application/json',
            ...(apiKey ? { Authorization: `ApiKey ${apiKey}` } : {}),
        };
    }

    async elasticPost<T>(path: string, body: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
        return this.request('POST', path, schema, JSON.stringify(body));
    }

    async elasticPut<T>(path: string, body: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
        return this.request('PUT', path, schema, JSON.stringify(body));
    }

    /** True when the path exists (HEAD answers 200), false on 404. */
    async elasticExists(path: string): Promise<boolean> {
        const resp = await this.send('HEAD', path);
        if (resp.status === 404) return false;
        if (!resp.ok) {
            throw new ProviderError('elasticsearch', `HEAD ${path} answered ${resp.status}`);
        }
        return true;
    }

    async elasticBulkSave(lines: object[]): Promise<void> {
        if (lines.length === 0) return;
        const ndjson = lines.map(line => JSON.stringify(line)).join('\n') + '\n';
        const result = await this.request('POST', '/_bulk', bulkResponseSchema, ndjson, 'application/x-ndjson');
        if (result.errors) {
            const failed = result.items.filter(item => Object.values(item).some(op => op.error !== undefined));
            this.logger.error(`Bulk request rejected ${failed.length} of ${result.items.length} operations`);
            throw new ProviderError('elasticsearch', 'Bulk insert failed');
        }
    }

    private async request<T>(
        method: HttpMethod,
        path: string,
        schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        body?: string,
        contentType?: string,
    ): Promise<T> {
        const resp = await this.send(method, path, body, contentType);
        if (!resp.ok) {
            const text = await resp.text();
            throw new ProviderError('elasticsearch', `${method} ${path} answered ${resp.status}: ${text.slice(0, 500)}`);
        }
        const parsed = schema.safeParse(await resp.json());
        if (!parsed.success) {
            throw new ProviderError('elasticsearch', `Unexpected response from ${path}: ${parsed.error.message}`);
        }
        return parsed.data;
    }

    private async send(method: HttpMethod, path: string, body?: string, contentType?: string): Promise<Response> {
        if (!this.esUrl) {
            throw new ProviderError('elasticsearch', 'ELASTIC_URL is not configured');
        }
        try {
            return await fetch(`${this.esUrl}${path}`, {
                method,
                headers: contentType ? { ...this.headers, 'Content-Type': contentType } : this.headers,
                body,
            });
        } catch (error) {
            throw new ProviderError('elasticsearch', `${method} ${path} failed: ${describeError(error)}`, error);
        }
    }
}
