import { ConversationTurn, RetrievedPassage } from '../../utils/types';
import { JsonExtraction } from '../../utils/json';
import { WebSearchOutcome } from '../web-search/types';

export enum WorkflowNode {
    Route = 'ROUTE',
    DocSearch = 'DOC_SEARCH',
    TransformQuery = 'TRANSFORM_QUERY',
    WebSearch = 'WEB_SEARCH',
    Generate = 'GENERATE',
}

export const ROUTE_DECISIONS = ['doc_search', 'web_search', 'generate'] as const;
export type RouteDecision = (typeof ROUTE_DECISIONS)[number];

export interface GraphState {
    question: string;
    history: ConversationTurn[];
    context: string;
    searchQuery: string;
    generation: string;
}

/** What a stage hands back: only the fields it changed. */
export type StateUpdate = Partial<Pick<GraphState, 'context' | 'searchQuery' | 'generation'>>;

export interface WorkflowOptions {
    model: string;
    temperature: number;
    enableInternetSearch: boolean;
    retrievalTopK: number;
}

export interface WorkflowInput {
    question: string;
    history: ConversationTurn[];
}

export interface WorkflowResult {
    generation: string;
    context: string;
    searchQuery: string;
    visited: WorkflowNode[];
}

export interface CompletionRequest {
    model: string;
    temperature: number;
    prompt: string;
    system?: string;
    history?: ConversationTurn[];
}

export interface CompletionClient {
    complete(request: CompletionRequest): Promise<string>;
    completeJson(request: CompletionRequest): Promise<JsonExtraction>;
}

export interface PassageRetriever {
    retrieve(query: string, k: number): Promise<RetrievedPassage[]>;
}

export interface WebSearcher {
    searchWithFallback(query: string): Promise<WebSearchOutcome>;
}

export interface WorkflowCollaborators {
    completion: CompletionClient;
    retriever: PassageRetriever;
    webSearch: WebSearcher;
}
