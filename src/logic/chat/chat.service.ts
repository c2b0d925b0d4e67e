import { HttpException, HttpStatus, Injectable, InternalServerErrorException, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../../config/configuration';
import { InvocationAbortedError, StoreFailure, describeError } from '../../utils/errors';
import { encodeToon } from '../../utils/toon';
import { ConversationTurn } from '../../utils/types';
import { AgentWorkflowFactory } from '../agent/agent-workflow.factory';
import { ChatHistoryService } from '../chat-history/chat-history.service';
import { GeminiService } from '../gemini/gemini.service';
import {
    AnalyzeRequestDto,
    AnalyzeResponse,
    ChatErrorBody,
    ClearHistoryResponse,
    HistoryResponse,
    QueryRequestDto,
    QueryResponse,
    StatelessQueryDto,
} from './dto/chat.dto';

function chatError(status: HttpStatus, body: ChatErrorBody): HttpException {
    return new HttpException(body, status);
}

@Injectable()
export class ChatService {
    private readonly logger = new Logger(ChatService.name);
    private readonly timeoutMs: number;

    constructor(
        private readonly workflowFactory: AgentWorkflowFactory,
        private readonly chatHistoryService: ChatHistoryService,
        private readonly geminiService: GeminiService,
        configService: ConfigService<AppConfig, true>,
    ) {
        this.timeoutMs = configService.get('REQUEST_TIMEOUT_MS', { infer: true });
    }

    /**
     * Answers with the user's stored history as context. The user and
     * assistant turns are saved together, after generation, and never for a
     * cancelled request.
     */
    async query(userId: string, body: QueryRequestDto, clientSignal?: AbortSignal): Promise<QueryResponse> {
        let history: ConversationTurn[];
        try {
            history = await this.chatHistoryService.getHistory(userId);
        } catch (error) {
            throw chatError(HttpStatus.INTERNAL_SERVER_ERROR, { code: 'HISTORY_LOAD_FAILED', message: describeError(error) });
        }
        this.logger.log(`Loaded ${history.length} history message(s) for user '${userId}'`);

        const workflow = this.workflowFactory.create(body);
        const { generation } = await this.generate(
            signal => workflow.invoke({ question: body.query, history }, signal),
            clientSignal,
        );

        const turns: ConversationTurn[] = [
            { role: 'user', content: body.query },
            { role: 'assistant', content: generation },
        ];
        try {
            await this.chatHistoryService.addMessages(userId, turns);
        } catch (error) {
            const message = error instanceof StoreFailure ? error.message : describeError(error);
            this.logger.error(`Answer for user '${userId}' was not saved: ${message}`);
            throw chatError(HttpStatus.INTERNAL_SERVER_ERROR, { code: 'HISTORY_NOT_PERSISTED', message, generation });
        }

        return {
            query: body.query,
            userId,
            generation,
            model: workflow.options.model,
            history: [...history, ...turns],
        };
    }

    /** Single-turn answer: no history is read or written. */
    async queryStateless(userId: string, params: StatelessQueryDto, clientSignal?: AbortSignal): Promise<QueryResponse> {
        const workflow = this.workflowFactory.create({ model: params.model });
        const { generation } = await this.generate(
            signal => workflow.invoke({ question: params.query, history: [] }, signal),
            clientSignal,
        );
        return { query: params.query, userId, generation, model: workflow.options.model, history: [] };
    }

    /** Answers a prompt over caller-supplied details with the Generate stage alone. */
    async analyze(userId: string, body: AnalyzeRequestDto, clientSignal?: AbortSignal): Promise<AnalyzeResponse> {
        const options = { model: body.model, temperature: body.temperature, enableInternetSearch: false };
        const generator = this.workflowFactory.createGenerator(options);
        const context = encodeToon({
            details: body.details.map(detail => ({ name: detail.name, value: detail.value, unit: detail.unit ?? '' })),
        });

        const generation = await this.generate(
            async signal => {
                if (signal.aborted) throw new InvocationAbortedError('GENERATE');
                return generator.generate(body.prompt, context, []);
            },
            clientSignal,
        );
        return {
            prompt: body.prompt,
            userId,
            generation,
            model: this.workflowFactory.resolveOptions(options).model,
            details: body.details,
        };
    }

    async getHistory(userId: string): Promise<HistoryResponse> {
        try {
            const [history, messageCount] = await Promise.all([
                this.chatHistoryService.getHistory(userId),
                this.chatHistoryService.getMessageCount(userId),
            ]);
            return { userId, messageCount, history };
        } catch (error) {
            throw chatError(HttpStatus.INTERNAL_SERVER_ERROR, { code: 'HISTORY_LOAD_FAILED', message: describeError(error) });
        }
    }

    async clearHistory(userId: string): Promise<ClearHistoryResponse> {
        try {
            const messagesDeleted = await this.chatHistoryService.clearHistory(userId);
            return { userId, messagesDeleted };
        } catch (error) {
            throw new InternalServerErrorException(describeError(error));
        }
    }

    async listModels(): Promise<{ models: string[] }> {
        return { models: await this.geminiService.listModels() };
    }

    /**
     * Runs a generation under the request deadline and the client's signal.
     * Cancellation becomes 504; any other failure 502.
     */
    private async generate<T>(task: (signal: AbortSignal) => Promise<T>, clientSignal?: AbortSignal): Promise<T> {
        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), this.timeoutMs);
        const onClientAbort = () => controller.abort();
        clientSignal?.addEventListener('abort', onClientAbort, { once: true });
        if (clientSignal?.aborted) controller.abort();

        const cancelled = new Promise<never>((_resolve, reject) => {
            const rejectAborted = () => reject(new InvocationAbortedError('deadline'));
            if (controller.signal.aborted) rejectAborted();
            controller.signal.addEventListener('abort', rejectAborted, { once: true });
        });

        try {
            return await Promise.race([task(controller.signal), cancelled]);
        } catch (error) {
            if (error instanceof InvocationAbortedError) {
                this.logger.warn(`Request cancelled: ${error.message}`);
                throw chatError(HttpStatus.GATEWAY_TIMEOUT, {
                    code: 'REQUEST_TIMEOUT',
                    message: `No answer within ${this.timeoutMs} ms or the client went away`,
                });
            }
            this.logger.error(`Generation failed: ${describeError(error)}`);
            throw chatError(HttpStatus.BAD_GATEWAY, { code: 'GENERATION_FAILED', message: describeError(error) });
        } finally {
            clearTimeout(timer);
            clientSignal?.removeEventListener('abort', onClientAbort);
        }
    }
}
