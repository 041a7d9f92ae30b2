import type { CitationReport, CitationReportEntry, ReportSnapshot, SerializedReport } from '../types/index.js';

/**
 * Counts used by the summary views.
 */
export interface ReportSummary {
    total: number;
    byPurpose: Record<string, number>;
    byStance: Record<string, number>;
    byResolution: Record<string, number>;
    byStatus: Record<string, number>;
}

export interface SummaryRow {
    purpose: string;
    stance: string;
    resolution: string;
    status: string;
}

/**
 * Wire mapping `reference_key → occurrences`, unresolved bucket included.
 */
export function serializeReport(report: CitationReport): SerializedReport {
    const serialized: SerializedReport = {};
    for (const [key, entries] of report.entries) {
        serialized[key] = entries.map((entry) => ({
            context_text: entry.window.text,
            start_offset: entry.marker.startOffset,
            purpose: entry.analysis.purpose,
            stance: entry.analysis.stance,
            contribution: entry.analysis.contribution,
            confidence: entry.analysis.confidence,
        }));
    }
    return serialized;
}

/**
 * All entries of a report, in report order.
 */
export function reportEntries(report: CitationReport): CitationReportEntry[] {
    return [...report.entries.values()].flat();
}

export function summarizeReport(report: CitationReport): ReportSummary {
    return summarizeRows(
        reportEntries(report).map((entry) => ({
            purpose: entry.analysis.purpose,
            stance: entry.analysis.stance,
            resolution: entry.resolution,
            status: entry.analysis.status,
        }))
    );
}

export function summarizeRows(rows: Iterable<SummaryRow>): ReportSummary {
    const summary: ReportSummary = { total: 0, byPurpose: {}, byStance: {}, byResolution: {}, byStatus: {} };
    for (const row of rows) {
        summary.total++;
        tally(summary.byPurpose, row.purpose);
        tally(summary.byStance, row.stance);
        tally(summary.byResolution, row.resolution);
        tally(summary.byStatus, row.status);
    }
    return summary;
}

function tally(counts: Record<string, number>, key: string): void {
    counts[key] = (counts[key] ?? 0) + 1;
}

/**
 * Flatten a report for storage and rendering.
 */
export function snapshotReport(report: CitationReport): ReportSnapshot {
    return {
        paper_title: report.paperTitle,
        generated_at: report.generatedAt,
        partial: report.partial,
        stats: { ...report.stats },
        references: [...report.references.values()].map((reference) => ({
            key: reference.key,
            number: reference.number,
            authors: [...reference.authors],
            year: reference.year,
            year_suffix: reference.yearSuffix,
            title: reference.title,
            raw_text: reference.rawText,
        })),
        citations: [...report.entries].flatMap(([bucket, entries]) =>
            entries.map((entry) => ({
                bucket,
                candidate_key: entry.candidateKey,
                marker_text: entry.marker.rawText,
                style: entry.marker.style,
                start_offset: entry.marker.startOffset,
                end_offset: entry.marker.endOffset,
                resolution: entry.resolution,
                ambiguity: entry.ambiguity,
                context_text: entry.window.text,
                window_start: entry.window.startOffset,
                window_end: entry.window.endOffset,
                truncated: entry.window.truncated,
                contribution: entry.analysis.contribution,
                purpose: entry.analysis.purpose,
                stance: entry.analysis.stance,
                confidence: entry.analysis.confidence,
                status: entry.analysis.status,
                unknown_fields: [...entry.analysis.unknownFields],
                error: entry.analysis.error,
            }))
        ),
    };
}
