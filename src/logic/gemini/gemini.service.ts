import { Inject, Injectable, Logger } from '@nestjs/common';
import { GoogleGenAI } from '@google/genai';
import { geminiConfig, GeminiConfig } from '../../config/configuration';
import { errorMessage } from '../../utils/errors';
import { ChatMessage, ChatModel, CompletionOptions, EmbeddingModel } from './model.ports';

@Injectable()
export class GeminiService implements EmbeddingModel, ChatModel {
    private readonly logger = new Logger(GeminiService.name);
    private genAI?: GoogleGenAI;

    constructor(@Inject(geminiConfig.KEY) private readonly config: GeminiConfig) { }

    // Created on first use so the app boots without a key when no model call is made.
    private client(): GoogleGenAI {
        if (!this.genAI) {
            if (!this.config.apiKey) {
                throw new Error('GEMINI_API_KEY is not configured');
            }
            this.genAI = new GoogleGenAI({ apiKey: this.config.apiKey });
        }
        return this.genAI;
    }

    async embedTexts(texts: string[], signal?: AbortSignal): Promise<number[][]> {
        if (texts.length === 0) {
            return [];
        }
        try {
            const result = await this.client().models.embedContent({
                contents: texts,
                model: this.config.embedModel,
                config: { abortSignal: signal }
            });
            const embeddings = (result.embeddings ?? [])
                .map(item => item?.values)
                .filter((values): values is number[] => Array.isArray(values));
            if (embeddings.length !== texts.length) {
                throw new Error(`expected ${texts.length} embeddings, got ${embeddings.length}`);
            }
            return embeddings;
        } catch (error) {
            this.logger.error(`Error generating embeddings: ${errorMessage(error)}`);
            throw new Error(`Failed to generate embeddings: ${errorMessage(error)}`, { cause: error });
        }
    }

    async complete(system: string, user: string, history: ChatMessage[], { temperature = 0.2, signal }: CompletionOptions = {}): Promise<string> {
        // Gemini doesn’t have a true 'system' role. Put it in a preamble (first user turn).
        const preamble = system?.trim() ? `${system.trim()}\n\n` : '';

        const hist = history.map(m => ({
            role: m.role === 'assistant' ? 'model' : 'user',
            parts: [{ text: m.content }]
        }));

        try {
            const result = await this.client().models.generateContent({
                model: this.config.chatModel,
                config: { temperature, abortSignal: signal },
                contents: [
                    ...(preamble ? [{ role: 'user', parts: [{ text: preamble }] }] : []),
                    ...hist,
                    { role: 'user', parts: [{ text: user }] }
                ]
            });
            return result.text ?? '';
        } catch (error) {
            this.logger.error(`complete error: ${errorMessage(error)}`);
            throw new Error(`Failed to generate content: ${errorMessage(error)}`, { cause: error });
        }
    }
}
