import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { AppConfig } from '../../config/configuration';
import { RetrievedPassage } from '../../utils/types';
import { extractTextFromBuffer, splitIntoChunks } from '../../utils/textNormalizer';
import { ElasticService } from '../elastic/elastic.service';
import { GeminiService } from '../gemini/gemini.service';
import { PassageRetriever } from '../agent/types';
import { RankedHit, fuseRankings } from './rank-fusion';

const EMBED_BATCH_SIZE = 50;
const CANDIDATE_MULTIPLIER = 10;

const searchResponseSchema = z.object({
    hits: z.object({
        hits: z.array(z.object({
            _id: z.string(),
            _source: z.object({ source: z.string(), content: z.string() }),
        })),
    }),
});

const sourcesResponseSchema = z.object({
    aggregations: z.object({
        sources: z.object({ buckets: z.array(z.object({ key: z.string() })) }),
    }),
});

const deleteResponseSchema = z.object({ deleted: z.number() });
const acknowledgedSchema = z.object({ acknowledged: z.boolean() }).passthrough();

export interface IngestResult {
    source: string;
    chunks: number;
}

/**
 * Private passage index on Elasticsearch. Each chunk is stored with its
 * source name and embedding; retrieval fuses a BM25 query with a kNN query.
 */
@Injectable()
export class DocumentStoreService implements PassageRetriever {
    private readonly logger = new Logger(DocumentStoreService.name);
    private readonly index: string;
    private readonly dimensions: number;
    private indexReady?: Promise<void>;

    constructor(
        private readonly elasticService: ElasticService,
        private readonly geminiService: GeminiService,
        configService: ConfigService<AppConfig, true>,
    ) {
        this.index = configService.get('ELASTIC_INDEX', { infer: true });
        this.dimensions = configService.get('EMBEDDING_DIMENSIONS', { infer: true });
    }

    async retrieve(query: string, k: number): Promise<RetrievedPassage[]> {
        const bm25 = await this.elasticService.elasticPost(`/${this.index}/_search`, {
            size: k,
            _source: ['source', 'content'],
            query: { match: { content: { query, fuzziness: 'AUTO' } } },
        }, searchResponseSchema);

        const [queryVector] = await this.geminiService.embedTexts([query]);
        const knn = await this.elasticService.elasticPost(`/${this.index}/_search`, {
            size: k,
            _source: ['source', 'content'],
            knn: { field: 'vec', query_vector: queryVector, k, num_candidates: k * CANDIDATE_MULTIPLIER },
        }, searchResponseSchema);

        const toRanked = (hits: z.infer<typeof searchResponseSchema>['hits']['hits']): RankedHit<RetrievedPassage>[] =>
            hits.map(hit => ({ id: hit._id, item: { source: hit._source.source, content: hit._source.content } }));

        const fused = fuseRankings([toRanked(bm25.hits.hits), toRanked(knn.hits.hits)], k);
        this.logger.log(`Retrieved ${fused.length} passages (bm25 ${bm25.hits.hits.length}, knn ${knn.hits.hits.length})`);
        return fused.map(hit => hit.item);
    }

    async ingest(fileName: string, buffer: Buffer): Promise<IngestResult> {
        const { text } = await extractTextFromBuffer(fileName, buffer);
        const chunks = splitIntoChunks(text);
        await this.ensureIndex();

        // Re-ingesting a source replaces its chunks.
        await this.deleteBySource(fileName);

        const bulk: object[] = [];
        for (let start = 0; start < chunks.length; start += EMBED_BATCH_SIZE) {
            const batch = chunks.slice(start, start + EMBED_BATCH_SIZE);
            const vectors = await this.geminiService.embedTexts(batch.map(chunk => chunk.text));
            batch.forEach((chunk, offset) => {
                bulk.push({ index: { _index: this.index, _id: `${fileName}__${chunk.chunkIndex}` } });
                bulk.push({
                    source: fileName,
                    chunk_index: chunk.chunkIndex,
                    content: chunk.text,
                    vec: vectors[offset],
                });
            });
        }
        await this.elasticService.elasticBulkSave(bulk);

        this.logger.log(`Indexed ${chunks.length} chunks from ${fileName}`);
        return { source: fileName, chunks: chunks.length };
    }

    async listSources(): Promise<string[]> {
        await this.ensureIndex();
        const result = await this.elasticService.elasticPost(`/${this.index}/_search`, {
            size: 0,
            aggs: { sources: { terms: { field: 'source', size: 1000, order: { _key: 'asc' } } } },
        }, sourcesResponseSchema);
        return result.aggregations.sources.buckets.map(bucket => bucket.key);
    }

    /** Deletes the chunks of one source, or every chunk when no source is given. */
    async deleteDocuments(source?: string): Promise<number> {
        await this.ensureIndex();
        return source ? this.deleteBySource(source) : this.deleteByQuery({ match_all: {} });
    }

    private deleteBySource(source: string): Promise<number> {
        return this.deleteByQuery({ term: { source } });
    }

    private async deleteByQuery(query: object): Promise<number> {
        const result = await this.elasticService.elasticPost(
            `/${this.index}/_delete_by_query?refresh=true`,
            { query },
            deleteResponseSchema,
        );
        return result.deleted;
    }

    private ensureIndex(): Promise<void> {
        this.indexReady ??= this.createIndexIfMissing().catch(error => {
            this.indexReady = undefined;
            throw error;
        });
        return this.indexReady;
    }

    private async createIndexIfMissing(): Promise<void> {
        if (await this.elasticService.elasticExists(`/${this.index}`)) return;
        await this.elasticService.elasticPut(`/${this.index}`, {
            mappings: {
                properties: {
                    source: { type: 'keyword' },
                    chunk_index: { type: 'integer' },
                    content: { type: 'text' },
                    vec: { type: 'dense_vector', dims: this.dimensions, index: true, similarity: 'cosine' },
                },
            },
        }, acknowledgedSchema);
        this.logger.log(`Created index ${this.index}`);
    }
}
