/**
 * Sentinel for fields the classifier did not (or could not) provide.
 */
export const UNKNOWN = 'UNKNOWN' as const;
export type Unknown = typeof UNKNOWN;

export enum CitationPurpose {
    SUPPORTING_EVIDENCE = 'SUPPORTING_EVIDENCE',
    CONTRAST = 'CONTRAST',
    BACKGROUND = 'BACKGROUND',
    METHODOLOGY = 'METHODOLOGY',
    OTHER = 'OTHER',
}

export enum CitationStance {
    AGREE = 'AGREE',
    CRITIQUE = 'CRITIQUE',
    EXTEND = 'EXTEND',
    NEUTRAL = 'NEUTRAL',
}

/**
 * OK        — every field came from the classifier
 * PARTIAL   — some fields defaulted to UNKNOWN
 * FAILED    — the classifier call failed; all fields UNKNOWN
 * CANCELLED — the run was cancelled or timed out before this call finished
 */
export type AnalysisStatus = 'OK' | 'PARTIAL' | 'FAILED' | 'CANCELLED';

export type AnalysisField = 'contribution' | 'purpose' | 'stance' | 'confidence';

/**
 * Bounded span of prose around a marker.
 */
export interface ContextWindow {
    text: string;
    sentenceCount: number;
    /** Offset of the marker's first character within `text` */
    containsMarkerAt: number;
    /** Absolute span of `text` in the body */
    startOffset: number;
    endOffset: number;
    /** Whether context sentences (or words) were trimmed to fit maxChars */
    truncated: boolean;
}

/**
 * Rhetorical analysis of one citation occurrence.
 */
export interface CitationAnalysis {
    contribution: string;
    purpose: CitationPurpose | Unknown;
    stance: CitationStance | Unknown;
    /** Classifier-reported confidence in [0, 1]; 0 when unknown */
    confidence: number;
    status: AnalysisStatus;
    /** Fields that were defaulted to UNKNOWN */
    unknownFields: AnalysisField[];
    error: string | null;
}
