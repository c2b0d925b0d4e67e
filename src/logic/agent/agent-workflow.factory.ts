import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../../config/configuration';
import { DocumentStoreService } from '../documents/document-store.service';
import { GeminiService } from '../gemini/gemini.service';
import { WebSearchService } from '../web-search/web-search.service';
import { AnswerGenerator } from './answer-generator';
import { AgentWorkflow, createAgentWorkflow } from './agent-workflow';
import { WorkflowCollaborators, WorkflowOptions } from './types';

export type WorkflowRequestOptions = Partial<Pick<WorkflowOptions, 'model' | 'temperature' | 'enableInternetSearch'>>;

/** Builds a fresh workflow per request over the process-wide collaborators. */
@Injectable()
export class AgentWorkflowFactory {
    private readonly collaborators: WorkflowCollaborators;

    constructor(
        geminiService: GeminiService,
        documentStore: DocumentStoreService,
        webSearchService: WebSearchService,
        private readonly configService: ConfigService<AppConfig, true>,
    ) {
        this.collaborators = { completion: geminiService, retriever: documentStore, webSearch: webSearchService };
    }

    resolveOptions(request: WorkflowRequestOptions = {}): WorkflowOptions {
        return {
            model: request.model?.trim() || this.configService.get('GEMINI_CHAT_MODEL', { infer: true }),
            temperature: request.temperature ?? this.configService.get('DEFAULT_TEMPERATURE', { infer: true }),
            enableInternetSearch: request.enableInternetSearch ?? this.configService.get('ENABLE_INTERNET_SEARCH', { infer: true }),
            retrievalTopK: this.configService.get('RETRIEVAL_TOP_K', { infer: true }),
        };
    }

    create(request: WorkflowRequestOptions = {}): AgentWorkflow {
        return createAgentWorkflow(this.collaborators, this.resolveOptions(request));
    }

    /** The Generate stage alone, for callers that bring their own context. */
    createGenerator(request: WorkflowRequestOptions = {}): AnswerGenerator {
        const options = this.resolveOptions(request);
        return new AnswerGenerator(this.collaborators.completion, options.model, options.temperature);
    }
}
