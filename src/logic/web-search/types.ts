import { WebSearchResult } from '../../utils/types';

/** Primary search engine: a short ranked list of hits. */
export interface WebSearchProvider {
    search(query: string, maxResults: number): Promise<WebSearchResult[]>;
}

/** Slower fallback that answers with a prose summary. */
export interface EncyclopediaProvider {
    summarize(query: string): Promise<string>;
}

export type WebSearchOutcome =
    | { kind: 'results'; query: string; results: WebSearchResult[] }
    | { kind: 'fallback'; query: string; summary: string }
    | { kind: 'failed'; query: string; message: string };

export interface Clock {
    now(): number;
    sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
    now: () => Date.now(),
    sleep: ms => new Promise(resolve => setTimeout(resolve, ms)),
};

export const WEB_SEARCH_PROVIDER = Symbol('WEB_SEARCH_PROVIDER');
export const ENCYCLOPEDIA_PROVIDER = Symbol('ENCYCLOPEDIA_PROVIDER');
