export type Role = 'user' | 'assistant';

export interface ConversationTurn {
    role: Role;
    content: string;
}

export interface RetrievedPassage {
    source: string;
    content: string;
}

export interface WebSearchResult {
    title: string;
    snippet: string;
    url: string;
}

export function isRole(value: unknown): value is Role {
    return value === 'user' || value === 'assistant';
}
