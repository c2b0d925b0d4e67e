import { Injectable } from '@nestjs/common';
import { SafeSearchType, search } from 'duck-duck-scrape';
import { ProviderError, RateLimitedError, describeError } from '../../utils/errors';
import { WebSearchResult } from '../../utils/types';
import { WebSearchProvider } from './types';

const RATE_LIMIT_PATTERN = /anomaly|too quickly|rate limit|429/i;

function stripMarkup(value: string): string {
    return value
        .replace(/<[^>]+>/g, '')
        .replace(/&amp;/g, '&')
        .replace(/&quot;/g, '"')
        .replace(/&#x27;|&#39;/g, "'")
        .replace(/&lt;/g, '<')
        .replace(/&gt;/g, '>')
        .trim();
}

@Injectable()
export class DuckDuckGoService implements WebSearchProvider {
    async search(query: string, maxResults: number): Promise<WebSearchResult[]> {
        try {
            const response = await search(query, { safeSearch: SafeSearchType.MODERATE });
            if (response.noResults) return [];
            return response.results.slice(0, maxResults).map(result => ({
                title: stripMarkup(result.title),
                snippet: stripMarkup(result.description),
                url: result.url,
            }));
        } catch (error) {
            const message = describeError(error);
            if (RATE_LIMIT_PATTERN.test(message)) {
                throw new RateLimitedError('duckduckgo', message, error);
            }
            throw new ProviderError('duckduckgo', message, error);
        }
    }
}
