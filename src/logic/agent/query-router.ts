import { Logger } from '@nestjs/common';
import { JsonExtraction } from '../../utils/json';
import { ROUTER_SYSTEM, buildRouterPrompt } from './prompts';
import { CompletionClient, ROUTE_DECISIONS, RouteDecision } from './types';

const DEFAULT_DECISION: RouteDecision = 'doc_search';

function isRouteDecision(value: string): value is RouteDecision {
    return ROUTE_DECISIONS.some(decision => decision === value);
}

/**
 * Reads the router's `{ "choice": ... }` reply. Anything missing or outside
 * the three decisions falls back to `doc_search`; the problem is returned so
 * the caller can log it.
 */
export function parseRouteDecision(reply: JsonExtraction): { decision: RouteDecision; problem?: string } {
    if (!reply.ok) {
        return { decision: DEFAULT_DECISION, problem: `unparseable router output ${JSON.stringify(reply.raw.slice(0, 200))}` };
    }
    const choice = reply.value.choice;
    if (typeof choice !== 'string') {
        return { decision: DEFAULT_DECISION, problem: 'router output has no "choice" field' };
    }
    const normalized = choice.trim().toLowerCase();
    if (!isRouteDecision(normalized)) {
        return { decision: DEFAULT_DECISION, problem: `unrecognized choice ${JSON.stringify(choice)}` };
    }
    return { decision: normalized };
}

export class QueryRouter {
    private readonly logger = new Logger(QueryRouter.name);

    constructor(
        private readonly completion: CompletionClient,
        private readonly model: string,
    ) {}

    /** Completion failures propagate; only malformed replies are defaulted. */
    async route(question: string): Promise<RouteDecision> {
        const reply = await this.completion.completeJson({
            model: this.model,
            temperature: 0,
            system: ROUTER_SYSTEM,
            prompt: buildRouterPrompt(question),
        });
        const { decision, problem } = parseRouteDecision(reply);
        if (problem) {
            this.logger.warn(`Router returned ${problem}; defaulting to ${decision}.`);
        }
        return decision;
    }
}
