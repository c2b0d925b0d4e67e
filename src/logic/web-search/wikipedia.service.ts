import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { AppConfig } from '../../config/configuration';
import { ProviderError, describeError } from '../../utils/errors';
import { EncyclopediaProvider } from './types';

const TOP_PAGES = 3;
const MAX_SUMMARY_CHARS = 4000;
const USER_AGENT = 'rag-router-api/0.1 (conversational question answering)';

const searchSchema = z.object({
    query: z.object({ search: z.array(z.object({ title: z.string() })) }),
});

const extractsSchema = z.object({
    query: z.object({
        pages: z.array(z.object({ title: z.string(), extract: z.string().optional() })),
    }),
});

/** Wikipedia Action API: search titles, then read the intro of each page. */
@Injectable()
export class WikipediaService implements EncyclopediaProvider {
    private readonly logger = new Logger(WikipediaService.name);
    private readonly apiUrl: string;

    constructor(configService: ConfigService<AppConfig, true>) {
        const language = configService.get('WIKIPEDIA_LANGUAGE', { infer: true });
        this.apiUrl = `https://${language}.wikipedia.org/w/api.php`;
    }

    async summarize(query: string): Promise<string> {
        const found = await this.call({
            action: 'query',
            list: 'search',
            srsearch: query,
            srlimit: String(TOP_PAGES),
        }, searchSchema);
        const titles = found.query.search.map(hit => hit.title);
        if (titles.length === 0) {
            throw new ProviderError('wikipedia', 'No good Wikipedia Search Result was found');
        }

        const pages = await this.call({
            action: 'query',
            prop: 'extracts',
            exintro: '1',
            explaintext: '1',
            titles: titles.join('|'),
        }, extractsSchema);
        const extracts = new Map(pages.query.pages.map(page => [page.title, page.extract ?? '']));

        // Keep search order; the extracts call returns pages in its own order.
        const summaries = titles
            .filter(title => extracts.get(title))
            .map(title => `Page: ${title}\nSummary: ${extracts.get(title)}`);
        if (summaries.length === 0) {
            throw new ProviderError('wikipedia', 'No good Wikipedia Search Result was found');
        }
        this.logger.log(`Wikipedia returned ${summaries.length} page(s) for "${query}"`);
        return summaries.join('\n\n').slice(0, MAX_SUMMARY_CHARS);
    }

    private async call<T>(params: Record<string, string>, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
        const url = new URL(this.apiUrl);
        for (const [key, value] of Object.entries({ ...params, format: 'json', formatversion: '2' })) {
            url.searchParams.set(key, value);
        }

        let resp: Response;
        try {
            resp = await fetch(url, { headers: { 'User-Agent': USER_AGENT } });
        } catch (error) {
            throw new ProviderError('wikipedia', `Request failed: ${describeError(error)}`, error);
        }
        if (!resp.ok) {
            throw new ProviderError('wikipedia', `Wikipedia answered ${resp.status}`);
        }
        const parsed = schema.safeParse(await resp.json());
        if (!parsed.success) {
            throw new ProviderError('wikipedia', `Unexpected response: ${parsed.error.message}`);
        }
        return parsed.data;
    }
}
