import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Content, GoogleGenAI } from '@google/genai';
import { AppConfig } from '../../config/configuration';
import { ProviderError, describeError } from '../../utils/errors';
import { JsonExtraction, extractJsonObject } from '../../utils/json';
import { CompletionClient, CompletionRequest } from '../agent/types';

type ResponseFormat = 'text' | 'json';

@Injectable()
export class GeminiService implements CompletionClient {
    private readonly logger = new Logger(GeminiService.name);
    private client?: GoogleGenAI;
    private readonly apiKey: string;
    private readonly EMBED_MODEL: string;
    private readonly CHAT_MODEL: string;

    constructor(private readonly configService: ConfigService<AppConfig, true>) {
        this.apiKey = this.configService.get('GEMINI_API_KEY', { infer: true });
        this.EMBED_MODEL = this.configService.get('GEMINI_EMBED_MODEL', { infer: true });
        this.CHAT_MODEL = this.configService.get('GEMINI_CHAT_MODEL', { infer: true });
    }

    private get genAI(): GoogleGenAI {
        if (!this.apiKey) {
            throw new ProviderError('gemini', 'GEMINI_API_KEY is not configured');
        }
        this.client ??= new GoogleGenAI({ apiKey: this.apiKey });
        return this.client;
    }

    async complete(request: CompletionRequest): Promise<string> {
        return this.generate(request, 'text');
    }

    async completeJson(request: CompletionRequest): Promise<JsonExtraction> {
        const text = await this.generate(request, 'json');
        const extracted = extractJsonObject(text);
        if (!extracted.ok) {
            this.logger.warn(`Model returned non-JSON output: ${extracted.raw.slice(0, 200)}`);
        }
        return extracted;
    }

    async embedTexts(texts: string[]): Promise<number[][]> {
        try {
            const result = await this.genAI.models.embedContent({ contents: texts, model: this.EMBED_MODEL });
            const embeddings = (result.embeddings ?? [])
                .map(item => item?.values)
                .filter((values): values is number[] => Array.isArray(values));
            if (embeddings.length !== texts.length) {
                throw new Error(`expected ${texts.length} embeddings, got ${embeddings.length}`);
            }
            return embeddings;
        } catch (error) {
            if (error instanceof ProviderError) throw error;
            throw new ProviderError('gemini', `Failed to generate embeddings: ${describeError(error)}`, error);
        }
    }

    async listModels(): Promise<string[]> {
        try {
            const pager = await this.genAI.models.list();
            const names: string[] = [];
            for await (const model of pager) {
                if (model.name && model.supportedActions?.includes('generateContent')) {
                    names.push(model.name.replace(/^models\//, ''));
                }
            }
            return names.length > 0 ? names : [this.CHAT_MODEL];
        } catch (error) {
            this.logger.warn(`Could not list models, using the configured default: ${describeError(error)}`);
            return [this.CHAT_MODEL];
        }
    }

    private async generate(request: CompletionRequest, format: ResponseFormat): Promise<string> {
        // Gemini calls the assistant role 'model'.
        const contents: Content[] = [
            ...(request.history ?? []).map(turn => ({
                role: turn.role === 'assistant' ? 'model' : 'user',
                parts: [{ text: turn.content }],
            })),
            { role: 'user', parts: [{ text: request.prompt }] },
        ];

        try {
            const result = await this.genAI.models.generateContent({
                model: request.model,
                contents,
                config: {
                    temperature: request.temperature,
                    ...(request.system?.trim() ? { systemInstruction: request.system.trim() } : {}),
                    ...(format === 'json' ? { responseMimeType: 'application/json' } : {}),
                },
            });
            return result.text ?? '';
        } catch (error) {
            if (error instanceof ProviderError) throw error;
            throw new ProviderError('gemini', `Failed to generate content: ${describeError(error)}`, error);
        }
    }
}
