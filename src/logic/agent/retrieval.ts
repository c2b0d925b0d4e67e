import { Logger } from '@nestjs/common';
import { ProviderError, describeError } from '../../utils/errors';
import { encodeToon } from '../../utils/toon';
import { ConversationTurn, RetrievedPassage } from '../../utils/types';
import { WebSearchOutcome } from '../web-search/types';
import { QueryReformulator } from './query-reformulator';
import { PassageRetriever, WebSearcher } from './types';

export function renderPassages(passages: RetrievedPassage[]): string {
    if (passages.length === 0) return '';
    return encodeToon({ documents: passages.map(({ source, content }) => ({ source, content })) });
}

export function renderWebOutcome(outcome: WebSearchOutcome): string {
    switch (outcome.kind) {
        case 'results':
            return encodeToon({ results: outcome.results.map(({ title, snippet, url }) => ({ title, snippet, url })) });
        case 'fallback':
            return outcome.summary;
        case 'failed':
            return outcome.message;
    }
}

export class RetrievalOrchestrator {
    private readonly logger = new Logger(RetrievalOrchestrator.name);

    constructor(
        private readonly reformulator: QueryReformulator,
        private readonly retriever: PassageRetriever,
        private readonly webSearch: WebSearcher,
        private readonly topK: number,
    ) {}

    async searchDocuments(question: string, history: ConversationTurn[]): Promise<{ context: string; searchQuery: string }> {
        this.logger.log(`Step: Searching Document Store for: "${question}"`);
        const searchQuery = await this.reformulator.standalone(question, history);

        let passages: RetrievedPassage[] = [];
        try {
            passages = await this.retriever.retrieve(searchQuery, this.topK);
        } catch (error) {
            // An unreachable index counts as "nothing found".
            if (!(error instanceof ProviderError)) throw error;
            this.logger.warn(`Document retrieval failed, continuing without passages: ${describeError(error)}`);
        }
        return { context: renderPassages(passages), searchQuery };
    }

    async searchWeb(query: string): Promise<string> {
        this.logger.log(`Step: Searching the Web for: "${query}"`);
        const outcome = await this.webSearch.searchWithFallback(query);
        if (outcome.kind === 'failed') {
            this.logger.warn(outcome.message);
        }
        return renderWebOutcome(outcome);
    }
}
