import type { CitationAnalysis, ContextWindow } from './analysis.js';
import type { CitationMarker, ResolutionConfidence } from './marker.js';
import type { ReferenceEntry } from './reference.js';

/** Report bucket for markers that matched no bibliography entry */
export const UNRESOLVED_BUCKET = 'unresolved';

/**
 * Input handed over by the document-extraction collaborator.
 */
export interface CitationDocument {
    /** Page-ordered body text */
    bodyText: string;
    /** Reference-list text (may be the tail slice of the same stream) */
    bibliographyText: string;
    /** Host paper title, best effort (may be empty) */
    title: string;
}

/**
 * One analyzed citation occurrence.
 */
export interface CitationReportEntry {
    marker: CitationMarker;
    candidateKey: string;
    reference: ReferenceEntry | null;
    resolution: ResolutionConfidence;
    /** Ambiguity message when resolution had to pick among several entries */
    ambiguity: string | null;
    window: ContextWindow;
    analysis: CitationAnalysis;
}

export interface ReportStats {
    markers: number;
    citations: number;
    references: number;
    exact: number;
    fuzzy: number;
    unresolved: number;
    ambiguous: number;
    failed: number;
    cancelled: number;
    elapsedMs: number;
}

/**
 * Per-document citation report. Keys are reference keys (plus the
 * "unresolved" bucket) in order of first occurrence; within a key, entries
 * follow their marker's start offset.
 */
export interface CitationReport {
    paperTitle: string;
    generatedAt: string;
    entries: ReadonlyMap<string, readonly CitationReportEntry[]>;
    references: ReadonlyMap<string, ReferenceEntry>;
    stats: ReportStats;
    /** True when a timeout or cancellation stopped classification early */
    partial: boolean;
}

/**
 * Serializable occurrence, the wire shape of a report entry.
 */
export interface SerializedOccurrence {
    context_text: string;
    start_offset: number;
    purpose: string;
    stance: string;
    contribution: string;
    confidence: number;
}

export type SerializedReport = Record<string, SerializedOccurrence[]>;
