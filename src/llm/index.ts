import type { ClassifierConfig, LlmProvider } from '../types/index.js';
import { getApiKey } from '../utils/config.js';
import { CiteLensError, ClassifierUnavailableError } from '../utils/errors.js';
import { createHttpClient, type HttpClient } from '../utils/http-client.js';
import { OllamaProvider } from './ollama.js';
import { OpenAiProvider } from './openai.js';

export { OpenAiProvider } from './openai.js';
export { OllamaProvider } from './ollama.js';

/**
 * Create the LLM provider named by the classifier configuration.
 * The HTTP client carries the configured request timeout and transport retries.
 */
export function createLlmProvider(
    config: ClassifierConfig,
    http: HttpClient = createHttpClient({ timeout: config.requestTimeoutMs, maxRetries: config.transportRetries })
): LlmProvider {
    switch (config.provider) {
        case 'openai': {
            const apiKey = getApiKey('OPENAI_API_KEY');
            if (!apiKey && !config.baseUrl) {
                throw new CiteLensError('OPENAI_API_KEY is not set; export it or choose --provider ollama');
            }
            return new OpenAiProvider({ apiKey, baseUrl: config.baseUrl, model: config.model }, http);
        }
        case 'ollama':
            return new OllamaProvider({ baseUrl: config.baseUrl, model: config.model }, http);
    }
}

/**
 * Check the provider once before a run; citations are never sent to a
 * provider that reports itself unavailable.
 *
 * @throws ClassifierUnavailableError
 */
export async function ensureProviderAvailable(provider: LlmProvider): Promise<void> {
    if (await provider.isAvailable()) return;
    throw new ClassifierUnavailableError(
        `LLM provider ${provider.name} is not available; check its server or credentials`,
        undefined,
        { provider: provider.name }
    );
}
