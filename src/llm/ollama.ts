import type { LlmCompletionParams, LlmCompletionResult, LlmProvider, LlmProviderOptions } from '../types/index.js';
import { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { parseJsonText } from './json.js';

const DEFAULT_BASE_URL = 'http://localhost:11434';

interface OllamaChatResponse {
    model?: string;
    message?: { role?: string; content?: string };
    done?: boolean;
    prompt_eval_count?: number;
    eval_count?: number;
}

/**
 * Local models served by Ollama's /api/chat endpoint.
 */
export class OllamaProvider implements LlmProvider {
    readonly name = 'ollama';

    private readonly baseUrl: string;
    private readonly model: string;

    constructor(options: LlmProviderOptions, private readonly http: HttpClient = new HttpClient()) {
        this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
        this.model = options.model;
    }

    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult> {
        const messages: Array<{ role: 'system' | 'user'; content: string }> = [];
        if (params.systemPrompt) {
            messages.push({ role: 'system', content: params.systemPrompt });
        }
        messages.push({ role: 'user', content: prompt });

        const model = params.model ?? this.model;
        const body: Record<string, unknown> = {
            model,
            messages,
            stream: false,
            options: {
                temperature: params.temperature ?? 0.3,
                num_predict: params.maxTokens ?? 500,
            },
        };
        if (params.jsonMode) {
            body['format'] = 'json';
        }

        const response = await this.http.post<OllamaChatResponse>(`${this.baseUrl}/api/chat`, body, {
            source: 'ollama',
            signal: params.signal,
        });

        const data = response.data;
        const text = data.message?.content ?? '';
        const promptTokens = data.prompt_eval_count ?? 0;
        const completionTokens = data.eval_count ?? 0;

        return {
            text,
            parsed: params.jsonMode ? parseJsonText(text) : undefined,
            usage: {
                promptTokens,
                completionTokens,
                totalTokens: promptTokens + completionTokens,
            },
            model: data.model ?? model,
            provider: this.name,
        };
    }

    async isAvailable(): Promise<boolean> {
        try {
            const response = await this.http.get(`${this.baseUrl}/api/tags`, { source: 'ollama', timeout: 2000 });
            return response.ok;
        } catch (error) {
            getLogger().debug({ baseUrl: this.baseUrl, error }, 'Ollama server not reachable');
            return false;
        }
    }
}
