/**
 * Barrel export for all shared types.
 */
export type { ReferenceEntry } from './reference.js';
export { MarkerStyle, ResolutionConfidence } from './marker.js';
export type {
    CitationMarker,
    ResolvedCitation,
    ResolutionAmbiguityRecord,
    AmbiguityKind,
} from './marker.js';
export { UNKNOWN, CitationPurpose, CitationStance } from './analysis.js';
export type {
    Unknown,
    AnalysisStatus,
    AnalysisField,
    ContextWindow,
    CitationAnalysis,
} from './analysis.js';
export { UNRESOLVED_BUCKET } from './report.js';
export type {
    CitationDocument,
    CitationReport,
    CitationReportEntry,
    ReportStats,
    SerializedOccurrence,
    SerializedReport,
} from './report.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    CiteLensConfig,
    LogLevel,
    ReportFormat,
    LlmProviderName,
    WindowConfig,
    ResolverConfig,
    ClassifierConfig,
    RunRecord,
} from './config.js';
export type { Classifier, ClassifierRequest } from './classifier.js';
export type {
    LlmProvider,
    LlmCompletionParams,
    LlmCompletionResult,
    LlmProviderOptions,
} from './llm-provider.js';
export type { ReportSnapshot, SnapshotReference, SnapshotCitation } from './snapshot.js';
