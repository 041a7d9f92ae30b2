export * from './types/index.js';

export { buildReferenceIndex, ReferenceIndex, splitEntries, parseEntryFields, parseAuthors } from './references/reference-index.js';
export { normalizeSurname, surnameOf, surnameSimilarity } from './references/names.js';
export { scanMarkers, extractNumericKeys, extractAuthorYearKeys } from './markers/scanner.js';
export { resolveMarker, parseAuthorYearKey } from './markers/resolver.js';
export { buildWindow, ContextWindowBuilder } from './context/window-builder.js';
export { splitSentences } from './context/sentences.js';
export { splitFullText, guessTitle } from './document/sections.js';
export { loadDocument, type DocumentSource } from './document/loader.js';

export { CitationClassifierAdapter } from './classifier/adapter.js';
export { LlmClassifier, type LlmClassifierOptions } from './classifier/llm-classifier.js';
export { parseClassifierReply, parsePurpose, parseStance } from './classifier/response.js';
export { buildClassificationPrompt, referenceHint } from './classifier/prompt.js';
export { createLlmProvider, ensureProviderAvailable, OpenAiProvider, OllamaProvider } from './llm/index.js';

export { runPipeline, type PipelineConfig, type PipelineOptions } from './pipeline/orchestrator.js';
export { serializeReport, summarizeReport, snapshotReport, type ReportSummary } from './pipeline/report.js';

export { ResponseCache } from './cache/response-cache.js';
export { ReportDatabase } from './storage/database.js';
export { renderReport, exportRun, snapshotMapping } from './exporters/export.js';
export { resolveConfig, mergeConfig, type ConfigOverrides } from './utils/config.js';
export { HttpClient, HttpError, createHttpClient, type HttpClientOptions, type HttpRequestOptions, type HttpResponse } from './utils/http-client.js';
export {
    CiteLensError,
    ParseError,
    ScanError,
    ResolutionAmbiguous,
    ClassifierError,
    ClassifierUnavailableError,
} from './utils/errors.js';
export { initLogger, getLogger, type LoggerOptions } from './utils/logger.js';
