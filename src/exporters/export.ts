import { writeFileSync } from 'node:fs';
import { ReportDatabase } from '../storage/database.js';
import { summarizeRows, type ReportSummary } from '../pipeline/report.js';
import {
    UNRESOLVED_BUCKET,
    type ReportFormat,
    type ReportSnapshot,
    type SerializedReport,
    type SnapshotCitation,
} from '../types/index.js';
import { CiteLensError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export const REPORT_FORMATS: readonly ReportFormat[] = ['json', 'csv', 'markdown'];

export const FORMAT_EXTENSIONS: Record<ReportFormat, string> = {
    json: '.json',
    csv: '.csv',
    markdown: '.md',
};

export function isReportFormat(value: string): value is ReportFormat {
    return REPORT_FORMATS.some((format) => format === value);
}

// ─── Main Export Function ────────────────────────────────

/**
 * Export a stored run from a citelens database. Defaults to the latest run.
 * Returns the exported run ID.
 */
export function exportRun(
    dbPath: string,
    outputPath: string,
    format: ReportFormat,
    runId?: number
): number {
    const db = new ReportDatabase(dbPath);

    try {
        const id = runId ?? db.latestRunId();
        if (id === undefined) {
            throw new CiteLensError(`No runs stored in ${dbPath}`);
        }

        const snapshot = db.loadSnapshot(id);
        if (!snapshot) {
            throw new CiteLensError(`Run ${id} not found in ${dbPath}`, { runId: id });
        }

        writeFileSync(outputPath, renderReport(snapshot, format), 'utf-8');
        getLogger().info({ format, outputPath, runId: id, citations: snapshot.citations.length }, 'Report exported');
        return id;
    } finally {
        db.close();
    }
}

/**
 * Render a report snapshot in the requested format.
 */
export function renderReport(snapshot: ReportSnapshot, format: ReportFormat): string {
    switch (format) {
        case 'json':
            return exportJson(snapshot);
        case 'csv':
            return exportCSV(snapshot);
        case 'markdown':
            return exportMarkdown(snapshot);
    }
}

/**
 * The `reference_key → occurrences` mapping of a snapshot.
 */
export function snapshotMapping(snapshot: ReportSnapshot): SerializedReport {
    const mapping: SerializedReport = {};
    for (const citation of snapshot.citations) {
        const occurrences = mapping[citation.bucket] ?? [];
        occurrences.push({
            context_text: citation.context_text,
            start_offset: citation.start_offset,
            purpose: citation.purpose,
            stance: citation.stance,
            contribution: citation.contribution,
            confidence: citation.confidence,
        });
        mapping[citation.bucket] = occurrences;
    }
    return mapping;
}

export function summarizeSnapshot(snapshot: ReportSnapshot): ReportSummary {
    return summarizeRows(snapshot.citations);
}

// ─── Format Implementations ─────────────────────────────

function exportJson(snapshot: ReportSnapshot): string {
    return JSON.stringify({
        paper_title: snapshot.paper_title,
        generated_at: snapshot.generated_at,
        partial: snapshot.partial,
        stats: snapshot.stats,
        citations: snapshotMapping(snapshot),
    }, null, 2);
}

const CSV_COLUMNS: ReadonlyArray<keyof SnapshotCitation> = [
    'bucket',
    'candidate_key',
    'marker_text',
    'start_offset',
    'resolution',
    'purpose',
    'stance',
    'confidence',
    'status',
    'contribution',
    'context_text',
];

function exportCSV(snapshot: ReportSnapshot): string {
    let csv = `${CSV_COLUMNS.map((column) => (column === 'bucket' ? 'reference_key' : column)).join(',')}\n`;
    for (const citation of snapshot.citations) {
        csv += CSV_COLUMNS.map((column) => csvCell(citation[column])).join(',') + '\n';
    }
    return csv;
}

function csvCell(value: SnapshotCitation[keyof SnapshotCitation]): string {
    if (value === null) return '';
    if (typeof value === 'number') return String(value);
    const text = Array.isArray(value) ? value.join(';') : String(value);
    return `"${text.replace(/"/g, '""')}"`;
}

function exportMarkdown(snapshot: ReportSnapshot): string {
    const lines: string[] = [];
    const title = snapshot.paper_title || 'Untitled paper';
    const references = new Map(snapshot.references.map((reference) => [reference.key, reference]));

    lines.push(`# Citation report: ${title}`, '');
    lines.push(
        `${snapshot.citations.length} citations of ${snapshot.references.length} references` +
        ` (${snapshot.stats.exact} exact, ${snapshot.stats.fuzzy} fuzzy, ${snapshot.stats.unresolved} unresolved)` +
        (snapshot.partial ? ', partial run' : '')
    );

    const buckets = new Map<string, SnapshotCitation[]>();
    for (const citation of snapshot.citations) {
        const bucket = buckets.get(citation.bucket) ?? [];
        bucket.push(citation);
        buckets.set(citation.bucket, bucket);
    }

    for (const [key, citations] of buckets) {
        lines.push('', `## ${key}`, '');
        const reference = references.get(key);
        if (reference) {
            lines.push(reference.raw_text, '');
        } else if (key === UNRESOLVED_BUCKET) {
            lines.push('Markers that matched no bibliography entry.', '');
        }

        for (const citation of citations) {
            lines.push(
                `- **${citation.marker_text}** at ${citation.start_offset}: ` +
                `${citation.purpose}, ${citation.stance}, confidence ${citation.confidence.toFixed(2)}`
            );
            lines.push(`  > ${citation.context_text.replace(/\s+/g, ' ')}`);
            lines.push(`  ${citation.error ? `Error: ${citation.error}` : citation.contribution}`);
            if (citation.ambiguity) {
                lines.push(`  Ambiguous: ${citation.ambiguity}`);
            }
        }
    }

    const summary = summarizeSnapshot(snapshot);
    lines.push('', ...summaryTable('Purpose', summary.byPurpose));
    lines.push('', ...summaryTable('Stance', summary.byStance));

    return lines.join('\n') + '\n';
}

function summaryTable(label: string, counts: Record<string, number>): string[] {
    const rows = Object.entries(counts).sort(([a], [b]) => a.localeCompare(b));
    return [
        `## Summary by ${label.toLowerCase()}`,
        '',
        `| ${label} | Citations |`,
        '| --- | --- |',
        ...rows.map(([value, count]) => `| ${value} | ${count} |`),
    ];
}
