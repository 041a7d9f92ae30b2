import type { Classifier, ClassifierRequest, LlmProvider } from '../types/index.js';
import { ClassifierUnavailableError } from '../utils/errors.js';
import { HttpError } from '../utils/http-client.js';
import { buildClassificationPrompt, SYSTEM_PROMPT } from './prompt.js';

export interface LlmClassifierOptions {
    model: string;
    temperature: number;
    maxTokens: number;
}

/**
 * Classifier backed by a chat-completion LLM in JSON mode.
 */
export class LlmClassifier implements Classifier {
    readonly id: string;

    constructor(
        private readonly provider: LlmProvider,
        private readonly options: LlmClassifierOptions
    ) {
        this.id = `${provider.name}:${options.model}`;
    }

    async classify(request: ClassifierRequest, options: { signal?: AbortSignal } = {}): Promise<unknown> {
        try {
            const result = await this.provider.complete(buildClassificationPrompt(request), {
                model: this.options.model,
                temperature: this.options.temperature,
                maxTokens: this.options.maxTokens,
                jsonMode: true,
                systemPrompt: SYSTEM_PROMPT,
                signal: options.signal,
            });
            return result.parsed ?? result.text;
        } catch (error) {
            if (error instanceof HttpError) {
                throw new ClassifierUnavailableError(
                    `${this.provider.name} request failed: ${error.message}`,
                    error.status,
                    { retryable: error.retryable }
                );
            }
            throw error;
        }
    }
}
