import { Logger } from '@nestjs/common';
import { ConversationTurn } from '../../utils/types';
import { NO_CONTEXT_MARKER, buildGenerateSystem } from './prompts';
import { CompletionClient } from './types';

export class AnswerGenerator {
    private readonly logger = new Logger(AnswerGenerator.name);

    constructor(
        private readonly completion: CompletionClient,
        private readonly model: string,
        private readonly temperature: number,
    ) {}

    async generate(question: string, context: string, history: ConversationTurn[]): Promise<string> {
        this.logger.log('Step: Generating Final Response');
        return this.completion.complete({
            model: this.model,
            temperature: this.temperature,
            system: buildGenerateSystem(context.trim() ? context : NO_CONTEXT_MARKER),
            history,
            prompt: question,
        });
    }
}
