import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Environment } from '../../config/configuration';

export class ElasticRequestError extends Error {
    constructor(readonly status: number, readonly path: string, body: string) {
        super(`Elasticsearch error ${status} on ${path}: ${body}`);
        this.name = 'ElasticRequestError';
    }
}

interface BulkResponse {
    errors: boolean;
    items: unknown[];
}

interface DeleteByQueryResponse {
    deleted: number;
}

@Injectable()
export class ElasticService {
    private readonly logger = new Logger(ElasticService.name);
    private readonly headers: Record<string, string>;
    private readonly esUrl: string;

    constructor(private readonly configService: ConfigService<Environment, true>) {
        this.esUrl = this.configService.get('ELASTIC_URL', { infer: true }).replace(/\/+$/, '');
        const esKey = this.configService.get('ELASTIC_API_KEY', { infer: true });
        this.headers = {
            'Content-Type': 'application/json',
            ...(esKey ? { 'Authorization': `APIKey ${esKey}` } : {}),
        };
    }

    async elasticGet<T>(path: string): Promise<T> {
        return this.request<T>('GET', path);
    }

    async elasticPost<T>(path: string, body: unknown): Promise<T> {
        return this.request<T>('POST', path, body);
    }

    async elasticPut<T>(path: string, body: unknown): Promise<T> {
        return this.request<T>('PUT', path, body);
    }

    /** Creates the index with the given mappings unless it already exists. */
    async ensureIndex(index: string, mappings: Record<string, unknown>): Promise<void> {
        try {
            await this.elasticPut(`/${index}`, { mappings });
            this.logger.log(`Created Elasticsearch index ${index}`);
        } catch (error) {
            if (error instanceof ElasticRequestError && error.status === 400 && error.message.includes('resource_already_exists_exception')) {
                return;
            }
            throw error;
        }
    }

    /** Deletes every document of `index` matching `query` and waits for the refresh. */
    async elasticDeleteByQuery(index: string, query: Record<string, unknown>): Promise<number> {
        const result = await this.elasticPost<DeleteByQueryResponse>(
            `/${index}/_delete_by_query?refresh=true&conflicts=proceed`,
            { query },
        );
        return result.deleted;
    }

    async elasticBulkSave(lines: unknown[]): Promise<BulkResponse> {
        const ndjson = lines.map(line => JSON.stringify(line)).join('\n') + '\n';
        const resp = await fetch(`${this.esUrl}/_bulk?refresh=wait_for`, {
            method: 'POST',
            headers: { ...this.headers, 'Content-Type': 'application/x-ndjson' },
            body: ndjson,
        });
        if (!resp.ok) {
            throw new ElasticRequestError(resp.status, '/_bulk', await resp.text());
        }
        const json = (await resp.json()) as BulkResponse;
        if (json.errors) {
            this.logger.error(`Elasticsearch bulk errors: ${JSON.stringify(json.items)}`);
            throw new Error('Bulk insert failed');
        }
        return json;
    }

    private async request<T>(method: string, path: string, body?: unknown): Promise<T> {
        const resp = await fetch(`${this.esUrl}${path}`, {
            method,
            headers: this.headers,
            body: body === undefined ? undefined : JSON.stringify(body),
        });
        if (!resp.ok) {
            throw new ElasticRequestError(resp.status, path, await resp.text());
        }
        return resp.json() as Promise<T>;
    }
}
