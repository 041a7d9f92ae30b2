import {
    MarkerStyle,
    ResolutionConfidence,
    type AmbiguityKind,
    type CitationMarker,
    type ReferenceEntry,
    type ResolvedCitation,
    type ResolverConfig,
} from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import type { ReferenceIndex } from '../references/reference-index.js';
import { normalizeSurname, surnameSimilarity } from '../references/names.js';
import { ResolutionAmbiguous } from '../utils/errors.js';

const AUTHOR_YEAR_KEY = /^(.+?),\s*(?:((?:1[5-9]|20)\d{2})([a-z])?|n\.d\.)$/u;

interface AuthorYearKey {
    surname: string;
    year: number | null;
    suffix: string | null;
}

/**
 * Resolve a scanned marker against the reference index.
 *
 * Returns one ResolvedCitation per candidate key (so exactly one for NUMERIC
 * and AUTHOR_YEAR markers); every element shares the original marker.
 */
export function resolveMarker(
    marker: CitationMarker,
    index: ReferenceIndex,
    options: Partial<ResolverConfig> = {}
): ResolvedCitation[] {
    const config: ResolverConfig = { ...DEFAULT_CONFIG.resolver, ...options };

    if (marker.candidateKeys.length === 0) {
        return [unresolved(marker, marker.rawText)];
    }

    switch (marker.style) {
        case MarkerStyle.NUMERIC:
            return marker.candidateKeys.map((key) => resolveNumeric(marker, key, index));
        case MarkerStyle.AUTHOR_YEAR:
            return marker.candidateKeys.map((key) => resolveAuthorYear(marker, key, index, config));
        case MarkerStyle.MIXED:
            return marker.candidateKeys.map((key) =>
                /^\d+$/.test(key)
                    ? resolveNumeric(marker, key, index)
                    : resolveAuthorYear(marker, key, index, config)
            );
    }
}

function resolveNumeric(marker: CitationMarker, key: string, index: ReferenceIndex): ResolvedCitation {
    const entry = /^\d+$/.test(key) ? index.findByNumber(parseInt(key, 10)) : undefined;
    return entry ? resolved(marker, key, entry, ResolutionConfidence.EXACT, null) : unresolved(marker, key);
}

function resolveAuthorYear(
    marker: CitationMarker,
    key: string,
    index: ReferenceIndex,
    config: ResolverConfig
): ResolvedCitation {
    const parsed = parseAuthorYearKey(key);
    if (!parsed) return unresolved(marker, key);

    const candidates = index.candidatesByAuthorYear(parsed.surname, parsed.year);

    if (candidates.length > 0) {
        if (parsed.suffix) {
            const withSuffix = candidates.filter((entry) => entry.yearSuffix === parsed.suffix);
            const first = withSuffix[0];
            if (first && withSuffix.length === 1) {
                return resolved(marker, key, first, ResolutionConfidence.EXACT, null);
            }
            if (first) {
                return resolved(marker, key, first, ResolutionConfidence.FUZZY, ambiguity('same-author-year', key, withSuffix));
            }
        }

        const first = candidates[0];
        if (first && candidates.length === 1) {
            // A suffixed marker against a single unsuffixed entry is still a guess
            const confidence = parsed.suffix && first.yearSuffix !== parsed.suffix
                ? ResolutionConfidence.FUZZY
                : ResolutionConfidence.EXACT;
            return resolved(marker, key, first, confidence, null);
        }
        if (first) {
            return resolved(marker, key, first, ResolutionConfidence.FUZZY, ambiguity('same-author-year', key, candidates));
        }
    }

    return resolveFuzzy(marker, key, parsed, index, config);
}

/**
 * Fall back to surname similarity against every author of every entry. The
 * highest score wins; among equal scores, entries from the marker's year come
 * first, then document order. A winner from another year is recorded as a
 * year mismatch.
 */
function resolveFuzzy(
    marker: CitationMarker,
    key: string,
    parsed: AuthorYearKey,
    index: ReferenceIndex,
    config: ResolverConfig
): ResolvedCitation {
    const target = normalizeSurname(parsed.surname);
    if (target.length === 0) return unresolved(marker, key);

    let bestScore = 0;
    let best: ReferenceEntry[] = [];

    for (const entry of index.entries) {
        let score = 0;
        for (const surname of entry.surnames) {
            score = Math.max(score, surnameSimilarity(target, surname));
        }

        if (score > bestScore) {
            bestScore = score;
            best = [entry];
        } else if (score === bestScore && score > 0) {
            best.push(entry);
        }
    }

    if (bestScore < config.similarityFloor) {
        return unresolved(marker, key);
    }

    const sameYear = best.filter((entry) => entry.year === parsed.year);
    const winners = sameYear.length > 0 ? sameYear : best;
    const first = winners[0];
    if (!first) return unresolved(marker, key);

    let ambiguityRecord: ResolutionAmbiguous | null = null;
    if (winners.length > 1) {
        ambiguityRecord = ambiguity('fuzzy-tie', key, winners);
    } else if (first.year !== parsed.year) {
        ambiguityRecord = ambiguity('year-mismatch', key, winners);
    }

    return resolved(marker, key, first, ResolutionConfidence.FUZZY, ambiguityRecord);
}

/**
 * "Smith, 2020a" → { surname: "Smith", year: 2020, suffix: "a" }
 */
export function parseAuthorYearKey(key: string): AuthorYearKey | null {
    const match = AUTHOR_YEAR_KEY.exec(key.trim());
    if (!match) return null;

    const surname = (match[1] ?? '').trim();
    if (surname.length === 0) return null;

    return {
        surname,
        year: match[2] ? parseInt(match[2], 10) : null,
        suffix: match[3] ?? null,
    };
}

function ambiguity(kind: AmbiguityKind, key: string, entries: readonly ReferenceEntry[]): ResolutionAmbiguous {
    return new ResolutionAmbiguous(kind, key, entries.map((entry) => entry.key));
}

function resolved(
    marker: CitationMarker,
    candidateKey: string,
    reference: ReferenceEntry,
    confidence: ResolutionConfidence.EXACT | ResolutionConfidence.FUZZY,
    ambiguityRecord: ResolutionAmbiguous | null
): ResolvedCitation {
    return { marker, candidateKey, reference, confidence, ambiguity: ambiguityRecord };
}

function unresolved(marker: CitationMarker, candidateKey: string): ResolvedCitation {
    return { marker, candidateKey, reference: null, confidence: ResolutionConfidence.UNRESOLVED, ambiguity: null };
}
