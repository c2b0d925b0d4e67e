import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../../config/configuration';
import { DuckDuckGoService } from './duck-duck-go.service';
import { SearchRateLimiter } from './search-rate-limiter';
import { ENCYCLOPEDIA_PROVIDER, WEB_SEARCH_PROVIDER } from './types';
import { WebSearchService } from './web-search.service';
import { WikipediaService } from './wikipedia.service';

@Module({
    providers: [
        WebSearchService,
        { provide: WEB_SEARCH_PROVIDER, useClass: DuckDuckGoService },
        { provide: ENCYCLOPEDIA_PROVIDER, useClass: WikipediaService },
        {
            provide: SearchRateLimiter,
            useFactory: (configService: ConfigService<AppConfig, true>) =>
                new SearchRateLimiter(configService.get('WEB_SEARCH_MIN_INTERVAL_MS', { infer: true })),
            inject: [ConfigService],
        },
    ],
    exports: [WebSearchService],
})
export class WebSearchModule {}
