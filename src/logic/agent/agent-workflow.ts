import { Logger } from '@nestjs/common';
import { InvocationAbortedError } from '../../utils/errors';
import { AnswerGenerator } from './answer-generator';
import { QueryReformulator } from './query-reformulator';
import { QueryRouter } from './query-router';
import { RetrievalOrchestrator } from './retrieval';
import {
    GraphState,
    RouteDecision,
    StateUpdate,
    WorkflowCollaborators,
    WorkflowInput,
    WorkflowNode,
    WorkflowOptions,
    WorkflowResult,
} from './types';

/** Where the graph goes after routing. Web search needs the internet flag; without it the documents are tried. */
export function nextAfterRoute(decision: RouteDecision, enableInternetSearch: boolean): WorkflowNode {
    switch (decision) {
        case 'doc_search':
            return WorkflowNode.DocSearch;
        case 'web_search':
            return enableInternetSearch ? WorkflowNode.TransformQuery : WorkflowNode.DocSearch;
        case 'generate':
            return WorkflowNode.Generate;
        default: {
            const unreachable: never = decision;
            throw new Error(`Unknown route decision: ${String(unreachable)}`);
        }
    }
}

export function nextAfterDocSearch(context: string, enableInternetSearch: boolean): WorkflowNode {
    if (context.trim() !== '') return WorkflowNode.Generate;
    return enableInternetSearch ? WorkflowNode.TransformQuery : WorkflowNode.Generate;
}

interface StepResult {
    update: StateUpdate;
    next?: WorkflowNode;
}

export interface WorkflowStages {
    router: QueryRouter;
    reformulator: QueryReformulator;
    retrieval: RetrievalOrchestrator;
    generator: AnswerGenerator;
}

/**
 * Fixed decision graph:
 *
 *   ROUTE -> DOC_SEARCH | TRANSFORM_QUERY | GENERATE
 *   DOC_SEARCH -> TRANSFORM_QUERY | GENERATE
 *   TRANSFORM_QUERY -> WEB_SEARCH -> GENERATE -> end
 *
 * One instance serves one request; state never outlives `invoke`.
 */
export class AgentWorkflow {
    private readonly logger = new Logger(AgentWorkflow.name);

    constructor(
        private readonly stages: WorkflowStages,
        readonly options: WorkflowOptions,
    ) {}

    async invoke(input: WorkflowInput, signal?: AbortSignal): Promise<WorkflowResult> {
        let state: GraphState = {
            question: input.question,
            history: input.history,
            context: '',
            searchQuery: '',
            generation: '',
        };
        const visited: WorkflowNode[] = [];

        let node: WorkflowNode | undefined = WorkflowNode.Route;
        while (node !== undefined) {
            if (signal?.aborted) {
                throw new InvocationAbortedError(node);
            }
            visited.push(node);
            const step = await this.run(node, state);
            state = { ...state, ...step.update };
            node = step.next;
        }

        return {
            generation: state.generation,
            context: state.context,
            searchQuery: state.searchQuery,
            visited,
        };
    }

    private async run(node: WorkflowNode, state: GraphState): Promise<StepResult> {
        const { enableInternetSearch } = this.options;
        switch (node) {
            case WorkflowNode.Route: {
                this.logger.log('Step: Routing Query');
                const decision = await this.stages.router.route(state.question);
                const next = nextAfterRoute(decision, enableInternetSearch);
                if (decision === 'web_search' && next === WorkflowNode.DocSearch) {
                    this.logger.log('Step: Router chose web_search but internet search is disabled; falling back to doc_search.');
                }
                this.logger.log(`Step: Router Decision: ${decision} -> ${next}`);
                return { update: {}, next };
            }
            case WorkflowNode.DocSearch: {
                const update = await this.stages.retrieval.searchDocuments(state.question, state.history);
                const next = nextAfterDocSearch(update.context, enableInternetSearch);
                if (next === WorkflowNode.TransformQuery) {
                    this.logger.log('Step: No relevant documents found. Routing to Web Search.');
                } else if (update.context.trim() === '') {
                    this.logger.log('Step: No relevant documents found and Internet Search disabled. Routing to Generation.');
                } else {
                    this.logger.log('Step: Relevant documents found. Routing to Generation.');
                }
                return { update, next };
            }
            case WorkflowNode.TransformQuery: {
                const searchQuery = await this.stages.reformulator.forWebSearch(state.question);
                return { update: { searchQuery }, next: WorkflowNode.WebSearch };
            }
            case WorkflowNode.WebSearch: {
                const context = await this.stages.retrieval.searchWeb(state.searchQuery || state.question);
                return { update: { context }, next: WorkflowNode.Generate };
            }
            case WorkflowNode.Generate: {
                const generation = await this.stages.generator.generate(state.question, state.context, state.history);
                return { update: { generation } };
            }
            default: {
                const unreachable: never = node;
                throw new Error(`Unknown workflow node: ${String(unreachable)}`);
            }
        }
    }
}

/** Wires one request's stages from the shared collaborators. */
export function createAgentWorkflow(collaborators: WorkflowCollaborators, options: WorkflowOptions): AgentWorkflow {
    const router = new QueryRouter(collaborators.completion, options.model);
    const reformulator = new QueryReformulator(collaborators.completion, options.model);
    const retrieval = new RetrievalOrchestrator(reformulator, collaborators.retriever, collaborators.webSearch, options.retrievalTopK);
    const generator = new AnswerGenerator(collaborators.completion, options.model, options.temperature);
    return new AgentWorkflow({ router, reformulator, retrieval, generator }, options);
}
