import type { ReportStats } from './report.js';

/**
 * Flat, storable form of a CitationReport. This is what gets written to
 * SQLite and what the exporters render, so reports loaded back from a
 * database render the same as fresh ones.
 */
export interface ReportSnapshot {
    paper_title: string;
    generated_at: string;
    partial: boolean;
    stats: ReportStats;
    references: SnapshotReference[];
    /** Report order: bucket by first occurrence, "unresolved" last */
    citations: SnapshotCitation[];
}

export interface SnapshotReference {
    key: string;
    number: number | null;
    authors: string[];
    year: number | null;
    year_suffix: string | null;
    title: string;
    raw_text: string;
}

export interface SnapshotCitation {
    /** Reference key, or "unresolved" */
    bucket: string;
    candidate_key: string;
    marker_text: string;
    style: string;
    start_offset: number;
    end_offset: number;
    resolution: string;
    ambiguity: string | null;
    context_text: string;
    window_start: number;
    window_end: number;
    truncated: boolean;
    contribution: string;
    purpose: string;
    stance: string;
    confidence: number;
    status: string;
    unknown_fields: string[];
    error: string | null;
}
