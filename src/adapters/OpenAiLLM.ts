import OpenAI from 'openai';
import type { ChatMessage, CompletionOptions, LLM } from '../ports/LLM';

export const DEFAULT_CHAT_MODEL = 'gpt-4o-mini';

/** The part of the OpenAI client the adapter calls. */
export interface ChatClient {
    chat: {
        completions: {
            create(body: {
                model: string;
                messages: ChatMessage[];
                temperature: number;
                max_tokens: number;
                response_format?: { type: 'json_object' };
            }): Promise<{ choices: { message: { content: string | null } }[] }>;
        };
    };
}

export interface OpenAIChatAdapterOptions {
    apiKey?: string;
    /** Any OpenAI-compatible endpoint, e.g. Groq's. */
    baseURL?: string;
    model?: string;
    client?: ChatClient;
}

export class OpenAIChatAdapter implements LLM {
    private readonly client: ChatClient;
    private readonly model: string;

    constructor(options: OpenAIChatAdapterOptions = {}) {
        this.model = options.model ?? DEFAULT_CHAT_MODEL;

        if (options.client) {
            this.client = options.client;
            return;
        }
        if (!options.apiKey) {
            throw new Error('OPENAI_API_KEY is not set');
        }
        this.client = new OpenAI({
            apiKey: options.apiKey,
            baseURL: options.baseURL,
        });
    }

    async generateCompletion(messages: ChatMessage[], options?: CompletionOptions): Promise<string> {
        const response = await this.client.chat.completions.create({
            model: this.model,
            messages,
            temperature: options?.temperature ?? 0.7,
            max_tokens: options?.maxTokens ?? 1000,
            response_format: options?.json ? { type: 'json_object' } : undefined
        });

        return response.choices[0]?.message?.content ?? '';
    }
}
