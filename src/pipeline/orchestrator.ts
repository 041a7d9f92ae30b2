import pLimit from 'p-limit';
import {
    DEFAULT_CONFIG,
    ResolutionConfidence,
    UNRESOLVED_BUCKET,
    type CitationAnalysis,
    type CitationDocument,
    type CitationReport,
    type CitationReportEntry,
    type Classifier,
    type ClassifierConfig,
    type ContextWindow,
    type ReferenceEntry,
    type ResolvedCitation,
    type ResolverConfig,
    type WindowConfig,
} from '../types/index.js';
import { buildReferenceIndex } from '../references/reference-index.js';
import { scanMarkers } from '../markers/scanner.js';
import { resolveMarker } from '../markers/resolver.js';
import { ContextWindowBuilder } from '../context/window-builder.js';
import { CitationClassifierAdapter } from '../classifier/adapter.js';
import { CitationAnalysisSchema, unknownAnalysis } from '../classifier/response.js';
import { ResponseCache } from '../cache/response-cache.js';
import { getLogger } from '../utils/logger.js';

// ─── Options ─────────────────────────────────────────────

/**
 * Pipeline tuning. A full CiteLensConfig satisfies this shape.
 */
export interface PipelineConfig {
    /** Whole-document timeout; 0 disables it */
    timeoutMs?: number;
    window?: Partial<WindowConfig>;
    resolver?: Partial<ResolverConfig>;
    classifier?: Partial<Pick<ClassifierConfig, 'concurrency'>>;
}

export interface PipelineOptions {
    /** Raw classifier, or an adapter already wrapping one */
    classifier: Classifier | CitationClassifierAdapter;
    config?: PipelineConfig;
    /** Analyses keyed by classifier id + request; skipped when absent */
    cache?: ResponseCache | null;
    /** Cancels outstanding classifications */
    signal?: AbortSignal;
}

interface PendingCitation {
    citation: ResolvedCitation;
    window: ContextWindow;
}

class CancelledError extends Error {
    constructor() {
        super('Classification cancelled');
        this.name = 'CancelledError';
    }
}

// ─── Pipeline ────────────────────────────────────────────

/**
 * Analyze every citation of one document.
 *
 * Index → scan → resolve → dedupe → window → classify → assemble. Parse and
 * scan errors abort the document; classifier failures are recorded per
 * citation and processing continues. On timeout or cancellation, analyses
 * already completed are kept and the rest are recorded as CANCELLED.
 *
 * @throws ParseError when the bibliography yields no recognizable entry
 * @throws ScanError when the body text cannot be scanned
 */
export async function runPipeline(document: CitationDocument, options: PipelineOptions): Promise<CitationReport> {
    const logger = getLogger();
    const startedAt = Date.now();
    const config = options.config ?? {};
    const adapter = options.classifier instanceof CitationClassifierAdapter
        ? options.classifier
        : new CitationClassifierAdapter(options.classifier);

    // Index first: an unusable bibliography aborts before any scanning
    const index = buildReferenceIndex(document.bibliographyText);
    const markers = [...scanMarkers(document.bodyText)];

    const resolverConfig = { ...DEFAULT_CONFIG.resolver, ...config.resolver };
    const citations = dedupe(markers.flatMap((marker) => resolveMarker(marker, index, resolverConfig)));

    const windows = new ContextWindowBuilder(document.bodyText, config.window);
    const pending: PendingCitation[] = citations.map((citation) => ({
        citation,
        window: windows.build(citation.marker),
    }));

    logger.info(
        { markers: markers.length, citations: pending.length, references: index.size },
        'Citations resolved'
    );

    const analyses = await classifyAll(pending, document.title, adapter, {
        concurrency: config.classifier?.concurrency ?? DEFAULT_CONFIG.classifier.concurrency,
        timeoutMs: config.timeoutMs ?? DEFAULT_CONFIG.timeoutMs,
        cache: options.cache ?? null,
        signal: options.signal,
    });

    const report = assemble(document.title, index.entries, pending, analyses, markers.length, startedAt);
    logger.info({ ...report.stats, partial: report.partial }, 'Citation report assembled');
    return report;
}

/**
 * Drop repeated (reference, start offset) pairs. A list marker citing the
 * same entry twice, e.g. "(Smith, 2020; Smith, 2020)", yields one entry.
 */
function dedupe(citations: ResolvedCitation[]): ResolvedCitation[] {
    const seen = new Set<string>();
    const unique: ResolvedCitation[] = [];

    for (const citation of citations) {
        const key = citation.reference
            ? `${citation.reference.key}\u0000${citation.marker.startOffset}`
            : `${UNRESOLVED_BUCKET}\u0000${citation.marker.startOffset}\u0000${citation.candidateKey}`;
        if (seen.has(key)) continue;
        seen.add(key);
        unique.push(citation);
    }

    return unique;
}

// ─── Classification ─────────────────────────────────────

interface ClassifyOptions {
    concurrency: number;
    timeoutMs: number;
    cache: ResponseCache | null;
    signal?: AbortSignal;
}

async function classifyAll(
    pending: PendingCitation[],
    paperTitle: string,
    adapter: CitationClassifierAdapter,
    options: ClassifyOptions
): Promise<CitationAnalysis[]> {
    const logger = getLogger();
    const controller = new AbortController();
    let abortReason = 'Run cancelled';

    const onCallerAbort = () => controller.abort();
    if (options.signal?.aborted) {
        controller.abort();
    } else {
        options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    const timer = options.timeoutMs > 0
        ? setTimeout(() => {
            abortReason = `Run timed out after ${options.timeoutMs}ms`;
            logger.warn({ timeoutMs: options.timeoutMs }, 'Document timeout reached, cancelling classification');
            controller.abort();
        }, options.timeoutMs)
        : null;

    const limit = pLimit(Math.max(1, options.concurrency));
    const signal = controller.signal;

    const classifyOne = async ({ citation, window }: PendingCitation): Promise<CitationAnalysis> => {
        if (signal.aborted) return unknownAnalysis('CANCELLED', abortReason);

        const request = adapter.buildRequest(window, citation.reference, paperTitle);
        const cacheKey = ResponseCache.keyOf(adapter.classifierId, request);
        const cached = options.cache?.get(cacheKey, CitationAnalysisSchema);
        if (cached) return cached;

        try {
            const analysis = await untilAborted(
                adapter.classify(window, citation.reference, paperTitle, signal),
                signal
            );
            options.cache?.set(cacheKey, analysis);
            return analysis;
        } catch (error) {
            if (signal.aborted) return unknownAnalysis('CANCELLED', abortReason);

            const message = error instanceof Error ? error.message : String(error);
            logger.warn(
                { key: citation.reference?.key ?? UNRESOLVED_BUCKET, offset: citation.marker.startOffset, error: message },
                'Citation classification failed'
            );
            return unknownAnalysis('FAILED', message);
        }
    };

    try {
        return await Promise.all(pending.map((item) => limit(() => classifyOne(item))));
    } finally {
        if (timer) clearTimeout(timer);
        options.signal?.removeEventListener('abort', onCallerAbort);
    }
}

/**
 * Settle with the promise, or reject as soon as the signal aborts. The
 * abandoned promise keeps its handlers, so a late rejection is not unhandled.
 */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(new CancelledError());
        if (signal.aborted) {
            onAbort();
        } else {
            signal.addEventListener('abort', onAbort, { once: true });
        }

        void promise.then(
            (value) => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            }
        );
    });
}

// ─── Assembly ────────────────────────────────────────────

function assemble(
    paperTitle: string,
    references: readonly ReferenceEntry[],
    pending: PendingCitation[],
    analyses: CitationAnalysis[],
    markerCount: number,
    startedAt: number
): CitationReport {
    const resolvedBuckets = new Map<string, CitationReportEntry[]>();
    const unresolved: CitationReportEntry[] = [];

    const stats = {
        markers: markerCount,
        citations: pending.length,
        references: references.length,
        exact: 0,
        fuzzy: 0,
        unresolved: 0,
        ambiguous: 0,
        failed: 0,
        cancelled: 0,
        elapsedMs: 0,
    };

    pending.forEach(({ citation, window }, i) => {
        const analysis = analyses[i] ?? unknownAnalysis('CANCELLED', 'Not classified');
        const entry: CitationReportEntry = {
            marker: citation.marker,
            candidateKey: citation.candidateKey,
            reference: citation.reference,
            resolution: citation.confidence,
            ambiguity: citation.ambiguity?.message ?? null,
            window,
            analysis,
        };

        switch (citation.confidence) {
            case ResolutionConfidence.EXACT: stats.exact++; break;
            case ResolutionConfidence.FUZZY: stats.fuzzy++; break;
            case ResolutionConfidence.UNRESOLVED: stats.unresolved++; break;
        }
        if (citation.ambiguity) stats.ambiguous++;
        if (analysis.status === 'FAILED') stats.failed++;
        if (analysis.status === 'CANCELLED') stats.cancelled++;

        if (citation.reference) {
            const bucket = resolvedBuckets.get(citation.reference.key) ?? [];
            bucket.push(entry);
            resolvedBuckets.set(citation.reference.key, bucket);
        } else {
            unresolved.push(entry);
        }
    });

    // Pending items are already in (start offset, candidate) order; buckets
    // keep that order and the map keeps first-occurrence order of keys.
    const entries = new Map<string, readonly CitationReportEntry[]>(resolvedBuckets);
    if (unresolved.length > 0) {
        entries.set(UNRESOLVED_BUCKET, unresolved);
    }

    stats.elapsedMs = Date.now() - startedAt;

    return {
        paperTitle,
        generatedAt: new Date(startedAt).toISOString(),
        entries,
        references: new Map(references.map((reference) => [reference.key, reference])),
        stats,
        partial: stats.cancelled > 0,
    };
}
