export const NO_CONTEXT_MARKER = 'No additional context provided. Answer based on your internal knowledge.';

export const ROUTER_SYSTEM = `
You are an expert at routing a user question to the best source of information.

Choose exactly one of:
- "doc_search" when the question concerns the user's own documents, internal policies, procedures, or anything that could be in a private knowledge base.
- "web_search" when the question needs current events, recent facts, or public information you are unlikely to know reliably.
- "generate" when you can answer confidently from general knowledge (definitions, well-known facts, reasoning, writing help, casual conversation).

When unsure, prefer "doc_search".
Return JSON only, with a single key: { "choice": "doc_search" | "web_search" | "generate" }
No preamble, no explanation.
`;

export function buildRouterPrompt(question: string): string {
    return `Question to route: ${question}`;
}

export const CONTEXTUALIZE_SYSTEM = `
Given a chat history and the latest user question which might reference context in the chat history,
formulate a standalone question which can be understood without the chat history.
Do NOT answer the question, just reformulate it if needed and otherwise return it as is.
Output ONLY the question.
`;

export const WEB_QUERY_SYSTEM = `
You are an expert at crafting web search queries.
Rewrite the user's question into the short keyword query a search engine answers best.
Keep names, places, dates and version numbers. Drop filler words.
Return JSON only, with a single key: { "query": string }
`;

export function buildWebQueryPrompt(question: string): string {
    return `Question to transform: ${question}`;
}

/** System instruction for the final answer; `context` is already TOON or prose. */
export function buildGenerateSystem(context: string): string {
    return `
You are an AI assistant for research question tasks that synthesises the context you are given into a clear answer.
Use the conversation so far to resolve follow-up questions.
Answer strictly from the context when it is relevant. If the context does not contain the answer and you do not know it, say that you don't know.
Be concise and well structured. Cite the source names or page titles from the context where they help.

Context:
${context}
`.trim();
}
