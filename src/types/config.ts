/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Report output formats.
 */
export type ReportFormat = 'json' | 'csv' | 'markdown';

export type LlmProviderName = 'openai' | 'ollama';

/**
 * Context window sizing.
 */
export interface WindowConfig {
    /** Sentences to include before and after the marker's sentence */
    sentenceRadius: number;
    /** Hard cap on window length in characters */
    maxChars: number;
    /** Whether expansion may cross a blank-line paragraph break */
    crossParagraphs: boolean;
}

/**
 * Marker resolution tuning.
 */
export interface ResolverConfig {
    /** Minimum normalized surname similarity for a fuzzy match */
    similarityFloor: number;
}

/**
 * Classifier (LLM) configuration.
 */
export interface ClassifierConfig {
    provider: LlmProviderName;
    model: string;
    /** Base URL override (Ollama host or an OpenAI-compatible endpoint) */
    baseUrl?: string;
    temperature: number;
    maxTokens: number;
    /** Concurrent in-flight classifier calls */
    concurrency: number;
    /** Retries the HTTP transport may make on transient failures */
    transportRetries: number;
    /** Per-request timeout */
    requestTimeoutMs: number;
}

/**
 * Full citelens configuration merged from CLI flags, env vars, and config file.
 */
export interface CiteLensConfig {
    // Input
    input?: string;
    body?: string;
    bibliography?: string;
    title: string;

    // Output
    format: ReportFormat;
    report?: string;
    db?: string;

    // Run
    /** Whole-document timeout; 0 disables it */
    timeoutMs: number;

    // Cache
    noCache: boolean;
    cacheDir: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    window: WindowConfig;
    resolver: ResolverConfig;
    classifier: ClassifierConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: CiteLensConfig = {
    title: '',
    format: 'json',
    timeoutMs: 300000,
    noCache: false,
    cacheDir: '.citelens-cache',
    logLevel: 'info',
    jsonLogs: false,
    window: {
        sentenceRadius: 1,
        maxChars: 800,
        crossParagraphs: false,
    },
    resolver: {
        similarityFloor: 0.8,
    },
    classifier: {
        provider: 'openai',
        model: 'gpt-4.1-mini',
        temperature: 0.3,
        maxTokens: 500,
        concurrency: 4,
        transportRetries: 2,
        requestTimeoutMs: 60000,
    },
};

/**
 * Run metadata stored in the SQLite `runs` table.
 */
export interface RunRecord {
    run_id?: number;
    created_at: string;
    citelens_version: string;
    paper_title: string;
    config_json: string;
    stats_json: string;
    partial: number;
}
