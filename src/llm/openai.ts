import type { LlmCompletionParams, LlmCompletionResult, LlmProvider, LlmProviderOptions } from '../types/index.js';
import { HttpClient } from '../utils/http-client.js';
import { parseJsonText } from './json.js';

const DEFAULT_BASE_URL = 'https://api.openai.com/v1';

interface ChatCompletionResponse {
    model?: string;
    choices?: Array<{
        message?: { content?: string | null };
        finish_reason?: string;
    }>;
    usage?: {
        prompt_tokens?: number;
        completion_tokens?: number;
        total_tokens?: number;
    };
}

/**
 * OpenAI chat completions (or any OpenAI-compatible endpoint via baseUrl).
 */
export class OpenAiProvider implements LlmProvider {
    readonly name = 'openai';

    private readonly baseUrl: string;
    private readonly apiKey: string | undefined;
    private readonly model: string;

    constructor(options: LlmProviderOptions, private readonly http: HttpClient = new HttpClient()) {
        this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
        this.apiKey = options.apiKey;
        this.model = options.model;
    }

    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult> {
        const messages: Array<{ role: 'system' | 'user'; content: string }> = [];
        if (params.systemPrompt) {
            messages.push({ role: 'system', content: params.systemPrompt });
        }
        messages.push({ role: 'user', content: prompt });

        const body: Record<string, unknown> = {
            model: params.model ?? this.model,
            messages,
            temperature: params.temperature ?? 0.3,
            max_tokens: params.maxTokens ?? 500,
        };
        if (params.jsonMode) {
            body['response_format'] = { type: 'json_object' };
        }

        const headers: Record<string, string> = {};
        if (this.apiKey) {
            headers['Authorization'] = `Bearer ${this.apiKey}`;
        }

        const response = await this.http.post<ChatCompletionResponse>(`${this.baseUrl}/chat/completions`, body, {
            source: 'openai',
            headers,
            signal: params.signal,
        });

        const data = response.data;
        const text = data.choices?.[0]?.message?.content ?? '';
        const promptTokens = data.usage?.prompt_tokens ?? 0;
        const completionTokens = data.usage?.completion_tokens ?? 0;

        return {
            text,
            parsed: params.jsonMode ? parseJsonText(text) : undefined,
            usage: {
                promptTokens,
                completionTokens,
                totalTokens: data.usage?.total_tokens ?? promptTokens + completionTokens,
            },
            model: data.model ?? String(body['model']),
            provider: this.name,
        };
    }

    /** A key is required by the hosted API; compatible endpoints may run without one. */
    async isAvailable(): Promise<boolean> {
        return Boolean(this.apiKey) || this.baseUrl !== DEFAULT_BASE_URL;
    }
}
