import { Logger } from '@nestjs/common';
import { ConversationTurn } from '../../utils/types';
import { CONTEXTUALIZE_SYSTEM, WEB_QUERY_SYSTEM, buildWebQueryPrompt } from './prompts';
import { CompletionClient } from './types';

export class QueryReformulator {
    private readonly logger = new Logger(QueryReformulator.name);

    constructor(
        private readonly completion: CompletionClient,
        private readonly model: string,
    ) {}

    /** Rewrites a follow-up into a question that stands without the history. */
    async standalone(question: string, history: ConversationTurn[]): Promise<string> {
        if (history.length === 0) return question;

        this.logger.log('Step: Reformulating query with chat history context');
        const rewritten = await this.completion.complete({
            model: this.model,
            temperature: 0,
            system: CONTEXTUALIZE_SYSTEM,
            history,
            prompt: question,
        });
        return rewritten.trim() || question;
    }

    async forWebSearch(question: string): Promise<string> {
        this.logger.log('Step: Optimizing Query for Web Search');
        const reply = await this.completion.completeJson({
            model: this.model,
            temperature: 0,
            system: WEB_QUERY_SYSTEM,
            prompt: buildWebQueryPrompt(question),
        });
        if (reply.ok && typeof reply.value.query === 'string' && reply.value.query.trim()) {
            return reply.value.query.trim();
        }
        this.logger.warn('Query transformation gave no usable "query"; searching with the question as asked.');
        return question;
    }
}
