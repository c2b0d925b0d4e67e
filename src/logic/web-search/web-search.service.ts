import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../../config/configuration';
import { ProviderError, describeError } from '../../utils/errors';
import { WebSearcher } from '../agent/types';
import { SearchRateLimiter } from './search-rate-limiter';
import {
    ENCYCLOPEDIA_PROVIDER,
    EncyclopediaProvider,
    WEB_SEARCH_PROVIDER,
    WebSearchOutcome,
    WebSearchProvider,
} from './types';

/**
 * Primary search behind the shared rate limiter, falling back to the
 * encyclopedia. Never throws: a double failure becomes a `failed` outcome.
 */
@Injectable()
export class WebSearchService implements WebSearcher {
    private readonly logger = new Logger(WebSearchService.name);
    private readonly maxResults: number;

    constructor(
        @Inject(WEB_SEARCH_PROVIDER) private readonly primary: WebSearchProvider,
        @Inject(ENCYCLOPEDIA_PROVIDER) private readonly fallback: EncyclopediaProvider,
        private readonly rateLimiter: SearchRateLimiter,
        configService: ConfigService<AppConfig, true>,
    ) {
        this.maxResults = configService.get('WEB_SEARCH_MAX_RESULTS', { infer: true });
    }

    async searchWithFallback(query: string): Promise<WebSearchOutcome> {
        let primaryError: unknown;
        try {
            const results = await this.rateLimiter.schedule(() => this.primary.search(query, this.maxResults));
            if (results.length > 0) {
                return { kind: 'results', query, results };
            }
            primaryError = new ProviderError('duckduckgo', 'No results');
        } catch (error) {
            primaryError = error;
        }

        this.logger.warn(`Primary web search failed or rate limited: ${describeError(primaryError)}`);
        this.logger.log('Falling back to Wikipedia...');
        try {
            const summary = await this.fallback.summarize(query);
            return { kind: 'fallback', query, summary };
        } catch (fallbackError) {
            this.logger.error(`Fallback search failed: ${describeError(fallbackError)}`);
            return {
                kind: 'failed',
                query,
                message: `Search failed: ${describeError(primaryError)}. Fallback failed: ${describeError(fallbackError)}`,
            };
        }
    }
}
