import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { testConfigService } from '../../testing/config';
import { ProviderError, RateLimitedError } from '../../utils/errors';
import { WebSearchResult } from '../../utils/types';
import { SearchRateLimiter } from './search-rate-limiter';
import { Clock, ENCYCLOPEDIA_PROVIDER, WEB_SEARCH_PROVIDER } from './types';
import { WebSearchService } from './web-search.service';

describe('WebSearchService', () => {
    let service: WebSearchService;
    const primary = { search: jest.fn<Promise<WebSearchResult[]>, [string, number]>() };
    const fallback = { summarize: jest.fn<Promise<string>, [string]>() };
    const sleeps: number[] = [];
    let now = 0;
    const clock: Clock = {
        now: () => now,
        sleep: async ms => {
            sleeps.push(ms);
            now += ms;
        },
    };

    beforeEach(async () => {
        primary.search.mockReset();
        fallback.summarize.mockReset();
        sleeps.length = 0;
        now = 0;

        const module: TestingModule = await Test.createTestingModule({
            providers: [
                WebSearchService,
                { provide: WEB_SEARCH_PROVIDER, useValue: primary },
                { provide: ENCYCLOPEDIA_PROVIDER, useValue: fallback },
                { provide: SearchRateLimiter, useValue: new SearchRateLimiter(1000, clock) },
                { provide: ConfigService, useValue: testConfigService() },
            ],
        }).compile();

        service = module.get<WebSearchService>(WebSearchService);
    });

    it('returns primary results without touching the fallback', async () => {
        const results = [{ title: 'Paris', snippet: 'Capital of France', url: 'https://example.org/paris' }];
        primary.search.mockResolvedValue(results);

        await expect(service.searchWithFallback('capital of France')).resolves.toEqual({
            kind: 'results',
            query: 'capital of France',
            results,
        });
        expect(primary.search).toHaveBeenCalledWith('capital of France', 3);
        expect(fallback.summarize).not.toHaveBeenCalled();
    });

    it('falls back to the encyclopedia when the primary is rate limited', async () => {
        primary.search.mockRejectedValue(new RateLimitedError('duckduckgo', 'DDG detected an anomaly'));
        fallback.summarize.mockResolvedValue('Page: Paris\nSummary: Capital of France.');

        await expect(service.searchWithFallback('capital of France')).resolves.toEqual({
            kind: 'fallback',
            query: 'capital of France',
            summary: 'Page: Paris\nSummary: Capital of France.',
        });
    });

    it('falls back when the primary finds nothing', async () => {
        primary.search.mockResolvedValue([]);
        fallback.summarize.mockResolvedValue('Page: X\nSummary: Y');

        const outcome = await service.searchWithFallback('obscure');
        expect(outcome.kind).toBe('fallback');
    });

    it('reports both failures as context instead of throwing', async () => {
        primary.search.mockRejectedValue(new RateLimitedError('duckduckgo', 'too quickly'));
        fallback.summarize.mockRejectedValue(new ProviderError('wikipedia', 'Wikipedia answered 503'));

        await expect(service.searchWithFallback('anything')).resolves.toEqual({
            kind: 'failed',
            query: 'anything',
            message: 'Search failed: too quickly. Fallback failed: Wikipedia answered 503',
        });
    });

    it('spaces consecutive primary searches by the configured interval', async () => {
        primary.search.mockResolvedValue([{ title: 't', snippet: 's', url: 'u' }]);

        await service.searchWithFallback('first');
        await service.searchWithFallback('second');

        expect(sleeps).toEqual([1000]);
    });
});
