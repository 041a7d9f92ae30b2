import { z } from 'zod';
import {
    CitationPurpose,
    CitationStance,
    UNKNOWN,
    type AnalysisField,
    type CitationAnalysis,
    type Unknown,
} from '../types/index.js';
import { ClassifierError } from '../utils/errors.js';

// ─── Schema ──────────────────────────────────────────────

const ReplySchema = z.record(z.string(), z.unknown());

const ConfidenceSchema = z.union([
    z.number(),
    z.string().trim().regex(/^-?\d+(?:\.\d+)?%?$/).transform((value) =>
        value.endsWith('%') ? parseFloat(value) / 100 : parseFloat(value)
    ),
]);

const ANALYSIS_FIELDS: readonly AnalysisField[] = ['contribution', 'purpose', 'stance', 'confidence'];

/**
 * A complete analysis as stored between runs (response cache).
 */
export const CitationAnalysisSchema: z.ZodType<CitationAnalysis> = z.object({
    contribution: z.string(),
    purpose: z.union([z.nativeEnum(CitationPurpose), z.literal(UNKNOWN)]),
    stance: z.union([z.nativeEnum(CitationStance), z.literal(UNKNOWN)]),
    confidence: z.number().min(0).max(1),
    status: z.enum(['OK', 'PARTIAL', 'FAILED', 'CANCELLED']),
    unknownFields: z.array(z.enum(['contribution', 'purpose', 'stance', 'confidence'])),
    error: z.string().nullable(),
});

// ─── Enum aliases ────────────────────────────────────────

const PURPOSE_ALIASES: Record<string, CitationPurpose> = {
    SUPPORT: CitationPurpose.SUPPORTING_EVIDENCE,
    SUPPORTING: CitationPurpose.SUPPORTING_EVIDENCE,
    SUPPORTIVE: CitationPurpose.SUPPORTING_EVIDENCE,
    EVIDENCE: CitationPurpose.SUPPORTING_EVIDENCE,
    SUPPORTING_EVIDENCE: CitationPurpose.SUPPORTING_EVIDENCE,
    CONTRAST: CitationPurpose.CONTRAST,
    CONTRASTING: CitationPurpose.CONTRAST,
    CONTRASTING_VIEW: CitationPurpose.CONTRAST,
    COMPARISON: CitationPurpose.CONTRAST,
    BACKGROUND: CitationPurpose.BACKGROUND,
    BACKGROUND_INFORMATION: CitationPurpose.BACKGROUND,
    CONTEXT: CitationPurpose.BACKGROUND,
    METHOD: CitationPurpose.METHODOLOGY,
    METHODS: CitationPurpose.METHODOLOGY,
    METHODOLOGY: CitationPurpose.METHODOLOGY,
    METHODOLOGICAL: CitationPurpose.METHODOLOGY,
    OTHER: CitationPurpose.OTHER,
};

const STANCE_ALIASES: Record<string, CitationStance> = {
    AGREE: CitationStance.AGREE,
    AGREES: CitationStance.AGREE,
    AGREEMENT: CitationStance.AGREE,
    SUPPORTIVE: CitationStance.AGREE,
    CRITIQUE: CitationStance.CRITIQUE,
    CRITIQUES: CitationStance.CRITIQUE,
    CRITICAL: CitationStance.CRITIQUE,
    CRITICIZE: CitationStance.CRITIQUE,
    DISAGREE: CitationStance.CRITIQUE,
    DISAGREES: CitationStance.CRITIQUE,
    EXTEND: CitationStance.EXTEND,
    EXTENDS: CitationStance.EXTEND,
    EXTENSION: CitationStance.EXTEND,
    BUILDS_ON: CitationStance.EXTEND,
    NEUTRAL: CitationStance.NEUTRAL,
};

// ─── Parsing ─────────────────────────────────────────────

/**
 * Turn a raw classifier reply (object or JSON text) into an analysis.
 * Fields that are missing or unrecognized default to UNKNOWN and mark the
 * analysis PARTIAL.
 *
 * @throws ClassifierError when the reply carries no usable analysis at all
 */
export function parseClassifierReply(raw: unknown): CitationAnalysis {
    const reply = ReplySchema.safeParse(toObject(raw));
    if (!reply.success) {
        throw new ClassifierError('Classifier reply is not a JSON object', { reply: preview(raw) });
    }
    const fields = reply.data;

    if (fields['error'] !== undefined && fields['error'] !== null && fields['error'] !== false) {
        throw new ClassifierError(`Classifier reported a failure: ${describe(fields['error'])}`);
    }
    if (!ANALYSIS_FIELDS.some((field) => field in fields)) {
        throw new ClassifierError('Classifier reply has none of the analysis fields', {
            keys: Object.keys(fields),
        });
    }

    const unknownFields: AnalysisField[] = [];

    const contribution = parseContribution(fields['contribution']);
    if (contribution === UNKNOWN) unknownFields.push('contribution');

    const purpose = parseEnum(fields['purpose'], PURPOSE_ALIASES);
    if (purpose === UNKNOWN) unknownFields.push('purpose');

    const stance = parseEnum(fields['stance'], STANCE_ALIASES);
    if (stance === UNKNOWN) unknownFields.push('stance');

    const confidence = parseConfidence(fields['confidence']);
    if (confidence === null) unknownFields.push('confidence');

    return {
        contribution,
        purpose,
        stance,
        confidence: confidence ?? 0,
        status: unknownFields.length === 0 ? 'OK' : 'PARTIAL',
        unknownFields,
        error: null,
    };
}

/**
 * Analysis recorded for a citation whose classification did not complete.
 */
export function unknownAnalysis(status: 'FAILED' | 'CANCELLED', error: string): CitationAnalysis {
    return {
        contribution: UNKNOWN,
        purpose: UNKNOWN,
        stance: UNKNOWN,
        confidence: 0,
        status,
        unknownFields: [...ANALYSIS_FIELDS],
        error,
    };
}

/**
 * Normalize a free-form label ("supporting evidence", "Builds-on") to the
 * enum vocabulary, or UNKNOWN.
 */
export function parseEnum<T extends string>(value: unknown, aliases: Record<string, T>): T | Unknown {
    if (typeof value !== 'string') return UNKNOWN;
    const normalized = value.trim().toUpperCase().replace(/[^A-Z]+/g, '_').replace(/^_+|_+$/g, '');
    return aliases[normalized] ?? UNKNOWN;
}

export function parsePurpose(value: unknown): CitationPurpose | Unknown {
    return parseEnum(value, PURPOSE_ALIASES);
}

export function parseStance(value: unknown): CitationStance | Unknown {
    return parseEnum(value, STANCE_ALIASES);
}

function parseContribution(value: unknown): string {
    if (typeof value !== 'string') return UNKNOWN;
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : UNKNOWN;
}

function parseConfidence(value: unknown): number | null {
    const result = ConfidenceSchema.safeParse(value);
    if (!result.success || !Number.isFinite(result.data)) return null;
    return Math.min(1, Math.max(0, result.data));
}

/**
 * Replies may arrive as objects or as text (sometimes wrapped in prose or a
 * code fence); text is reduced to its outermost JSON object.
 */
function toObject(raw: unknown): unknown {
    if (raw === null || raw === undefined) {
        throw new ClassifierError('Classifier returned an empty reply');
    }
    if (typeof raw !== 'string') return raw;

    const text = raw.trim();
    if (text.length === 0) {
        throw new ClassifierError('Classifier returned an empty reply');
    }

    const parsed = tryParseJson(text);
    if (parsed.ok) return parsed.value;

    const open = text.indexOf('{');
    const close = text.lastIndexOf('}');
    if (open >= 0 && close > open) {
        const embedded = tryParseJson(text.slice(open, close + 1));
        if (embedded.ok) return embedded.value;
    }

    throw new ClassifierError('Classifier reply is not valid JSON', { reply: preview(text) });
}

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
    try {
        const value: unknown = JSON.parse(text);
        return { ok: true, value };
    } catch {
        return { ok: false };
    }
}

function describe(value: unknown): string {
    if (typeof value === 'string') return value;
    if (value !== null && typeof value === 'object' && 'message' in value && typeof value.message === 'string') {
        return value.message;
    }
    return JSON.stringify(value);
}

function preview(value: unknown): string {
    const text = typeof value === 'string' ? value : JSON.stringify(value) ?? String(value);
    return text.slice(0, 200);
}
