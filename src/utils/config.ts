import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type CiteLensConfig, type ClassifierConfig, type ResolverConfig, type WindowConfig } from '../types/index.js';
import { CiteLensError } from './errors.js';
import { getLogger } from './logger.js';

/**
 * Partial configuration as it arrives from one source (file, env, CLI).
 * Nested sections are partial too and are deep-merged.
 */
export type ConfigOverrides = Partial<Omit<CiteLensConfig, 'window' | 'resolver' | 'classifier'>> & {
    window?: Partial<WindowConfig>;
    resolver?: Partial<ResolverConfig>;
    classifier?: Partial<ClassifierConfig>;
};

// ─── Schemas ─────────────────────────────────────────────

const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
const ProviderSchema = z.enum(['openai', 'ollama']);

const FileConfigSchema = z.object({
    title: z.string(),
    format: z.enum(['json', 'csv', 'markdown']),
    report: z.string(),
    db: z.string(),
    timeoutMs: z.number().int().nonnegative(),
    noCache: z.boolean(),
    cacheDir: z.string().min(1),
    logLevel: LogLevelSchema,
    jsonLogs: z.boolean(),
    window: z.object({
        sentenceRadius: z.number().int().nonnegative(),
        maxChars: z.number().int().positive(),
        crossParagraphs: z.boolean(),
    }).partial(),
    resolver: z.object({
        similarityFloor: z.number().min(0).max(1),
    }).partial(),
    classifier: z.object({
        provider: ProviderSchema,
        model: z.string().min(1),
        baseUrl: z.string().url(),
        temperature: z.number().min(0).max(2),
        maxTokens: z.number().int().positive(),
        concurrency: z.number().int().positive(),
        transportRetries: z.number().int().nonnegative(),
        requestTimeoutMs: z.number().int().positive(),
    }).partial(),
}).partial().strict();

const EnvSchema = z.object({
    CITELENS_PROVIDER: ProviderSchema.optional(),
    CITELENS_MODEL: z.string().min(1).optional(),
    CITELENS_CONCURRENCY: z.coerce.number().int().positive().optional(),
    CITELENS_TIMEOUT_MS: z.coerce.number().int().nonnegative().optional(),
    CITELENS_LOG_LEVEL: LogLevelSchema.optional(),
    OLLAMA_BASE_URL: z.string().url().optional(),
});

function formatIssues(error: z.ZodError): string {
    return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

// ─── Sources ─────────────────────────────────────────────

/**
 * Load configuration from citelens.config.json using cosmiconfig.
 * Returns null if no config file is found (defaults are used).
 *
 * @throws CiteLensError when the file exists but holds invalid settings
 */
export async function loadConfigFile(searchFrom?: string): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('citelens', {
        searchPlaces: ['citelens.config.json'],
    });

    const result = await explorer.search(searchFrom);
    if (!result || result.isEmpty) return null;

    const parsed = FileConfigSchema.safeParse(result.config);
    if (!parsed.success) {
        throw new CiteLensError(`Invalid config file ${result.filepath}: ${formatIssues(parsed.error)}`, {
            path: result.filepath,
        });
    }

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    return parsed.data;
}

/**
 * Read relevant environment variables.
 * API keys are read where needed through getApiKey, never stored in config.
 *
 * @throws CiteLensError when a variable holds an invalid value
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        throw new CiteLensError(`Invalid environment configuration: ${formatIssues(parsed.error)}`);
    }

    const vars = parsed.data;
    const overrides: ConfigOverrides = {};
    const classifier: Partial<ClassifierConfig> = {};

    if (vars.CITELENS_PROVIDER) classifier.provider = vars.CITELENS_PROVIDER;
    if (vars.CITELENS_MODEL) classifier.model = vars.CITELENS_MODEL;
    if (vars.CITELENS_CONCURRENCY !== undefined) classifier.concurrency = vars.CITELENS_CONCURRENCY;
    if (vars.OLLAMA_BASE_URL && vars.CITELENS_PROVIDER === 'ollama') {
        classifier.baseUrl = vars.OLLAMA_BASE_URL;
    }
    if (vars.CITELENS_TIMEOUT_MS !== undefined) overrides.timeoutMs = vars.CITELENS_TIMEOUT_MS;
    if (vars.CITELENS_LOG_LEVEL) overrides.logLevel = vars.CITELENS_LOG_LEVEL;

    if (Object.keys(classifier).length > 0) overrides.classifier = classifier;
    return overrides;
}

// ─── Merge ───────────────────────────────────────────────

/**
 * Merge configuration sources over the defaults, later sources winning.
 * Undefined values never override.
 */
export function mergeConfig(...sources: Array<ConfigOverrides | null | undefined>): CiteLensConfig {
    let merged: CiteLensConfig = {
        ...DEFAULT_CONFIG,
        window: { ...DEFAULT_CONFIG.window },
        resolver: { ...DEFAULT_CONFIG.resolver },
        classifier: { ...DEFAULT_CONFIG.classifier },
    };

    for (const source of sources) {
        if (!source) continue;
        const { window, resolver, classifier, ...top } = source;
        merged = {
            ...merged,
            ...defined(top),
            // Deep merge nested objects
            window: { ...merged.window, ...defined(window ?? {}) },
            resolver: { ...merged.resolver, ...defined(resolver ?? {}) },
            classifier: { ...merged.classifier, ...defined(classifier ?? {}) },
        };
    }

    return merged;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(cliFlags: ConfigOverrides): Promise<CiteLensConfig> {
    const fileConfig = await loadConfigFile();
    const envConfig = loadEnvVars();
    return mergeConfig(fileConfig, envConfig, cliFlags);
}

function defined<T extends object>(values: T): Partial<T> {
    const result: Partial<T> = {};
    for (const key of Object.keys(values)) {
        if (!isKeyOf(values, key)) continue;
        const value = values[key];
        if (value !== undefined) result[key] = value;
    }
    return result;
}

function isKeyOf<T extends object>(values: T, key: string): key is Extract<keyof T, string> {
    return key in values;
}

/**
 * Get API key from environment variable.
 * @param name - Environment variable name
 * @returns The API key or undefined
 */
export function getApiKey(name: string): string | undefined {
    return process.env[name] || undefined;
}
