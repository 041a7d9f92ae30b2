import type { ReferenceEntry } from './reference.js';

/**
 * Marker style, decided once by the scanner.
 *
 *   NUMERIC     — a single bracketed number: [3]
 *   AUTHOR_YEAR — a single author-year citation: (Smith, 2020), Smith (2020)
 *   MIXED       — one marker carrying several citations: [1, 4-6], (Lee, 2019; Kim, 2020)
 */
export enum MarkerStyle {
    AUTHOR_YEAR = 'AUTHOR_YEAR',
    NUMERIC = 'NUMERIC',
    MIXED = 'MIXED',
}

/**
 * An in-text citation marker located in the body text.
 */
export interface CitationMarker {
    /** Marker text exactly as it appears in the body */
    rawText: string;

    /** Char offset of the first marker character */
    startOffset: number;

    /** Char offset just past the last marker character */
    endOffset: number;

    style: MarkerStyle;

    /** Key-like tokens: "3" for numeric, "Smith, 2020a" for author-year */
    candidateKeys: string[];
}

export enum ResolutionConfidence {
    EXACT = 'EXACT',
    FUZZY = 'FUZZY',
    UNRESOLVED = 'UNRESOLVED',
}

/**
 * Reason a resolution is a guess: several entries matched, or the only
 * match comes from another year.
 */
export type AmbiguityKind = 'same-author-year' | 'fuzzy-tie' | 'year-mismatch';

/**
 * A marker (or one sub-citation of a list marker) linked to its reference.
 * `reference` is null exactly when `confidence` is UNRESOLVED.
 */
export type ResolvedCitation =
    | {
          marker: CitationMarker;
          candidateKey: string;
          reference: ReferenceEntry;
          confidence: ResolutionConfidence.EXACT | ResolutionConfidence.FUZZY;
          ambiguity: ResolutionAmbiguityRecord | null;
      }
    | {
          marker: CitationMarker;
          candidateKey: string;
          reference: null;
          confidence: ResolutionConfidence.UNRESOLVED;
          ambiguity: null;
      };

/**
 * Shape of the non-fatal ambiguity recorded on a resolved citation.
 * Implemented by `ResolutionAmbiguous` in utils/errors.ts.
 */
export interface ResolutionAmbiguityRecord {
    readonly kind: AmbiguityKind;
    readonly candidateKey: string;
    /** Keys of every entry that matched, in document order */
    readonly matchedKeys: readonly string[];
    readonly message: string;
}
