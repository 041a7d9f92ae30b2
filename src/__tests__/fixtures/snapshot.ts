import type { ReportSnapshot } from '../../types/index.js';

/**
 * Two-citation snapshot: one exact match and one unresolved, failed call.
 */
export const SNAPSHOT: ReportSnapshot = {
    paper_title: 'Test paper',
    generated_at: '2026-01-01T00:00:00.000Z',
    partial: false,
    stats: {
        markers: 2,
        citations: 2,
        references: 1,
        exact: 1,
        fuzzy: 0,
        unresolved: 1,
        ambiguous: 0,
        failed: 1,
        cancelled: 0,
        elapsedMs: 5,
    },
    references: [
        {
            key: 'Smith, 2020',
            number: null,
            authors: ['Smith, J.'],
            year: 2020,
            year_suffix: null,
            title: 'Paper',
            raw_text: 'Smith, J. (2020). Paper.',
        },
    ],
    citations: [
        {
            bucket: 'Smith, 2020',
            candidate_key: 'Smith, 2020',
            marker_text: '(Smith, 2020)',
            style: 'AUTHOR_YEAR',
            start_offset: 9,
            end_offset: 22,
            resolution: 'EXACT',
            ambiguity: null,
            context_text: 'As shown (Smith, 2020), "quoted" text.',
            window_start: 0,
            window_end: 38,
            truncated: false,
            contribution: 'Shows the effect',
            purpose: 'SUPPORTING_EVIDENCE',
            stance: 'AGREE',
            confidence: 0.8,
            status: 'OK',
            unknown_fields: [],
            error: null,
        },
        {
            bucket: 'unresolved',
            candidate_key: 'Doe, 1999',
            marker_text: '(Doe, 1999)',
            style: 'AUTHOR_YEAR',
            start_offset: 50,
            end_offset: 61,
            resolution: 'UNRESOLVED',
            ambiguity: null,
            context_text: 'Unknown\nwork (Doe, 1999).',
            window_start: 39,
            window_end: 64,
            truncated: false,
            contribution: 'UNKNOWN',
            purpose: 'UNKNOWN',
            stance: 'UNKNOWN',
            confidence: 0,
            status: 'FAILED',
            unknown_fields: ['contribution', 'purpose', 'stance', 'confidence'],
            error: 'Classifier stub failed: boom',
        },
    ],
};
