import { MarkerStyle, type CitationMarker } from '../types/index.js';
import { ScanError } from '../utils/errors.js';
import {
    MARKER_PATTERNS,
    NAME_PATTERN,
    YEAR_PATTERN,
    CITATION_PREFIX_PATTERN,
    type MarkerPattern,
} from './patterns.js';

/** Upper bound on numbers produced by expanding one range such as [3-9] */
const MAX_RANGE_EXPANSION = 50;

interface CompiledPattern extends MarkerPattern {
    regex: RegExp;
}

/**
 * Scan body text for citation markers.
 *
 * The returned iterable is lazy (markers are found as iteration advances),
 * finite, and restartable: every `for...of` runs a fresh left-to-right pass.
 * Markers come out ordered by start offset and never overlap.
 *
 * @throws ScanError when the text is not scannable prose
 */
export function scanMarkers(bodyText: string): Iterable<CitationMarker> {
    const nul = bodyText.indexOf('\u0000');
    if (nul >= 0) {
        throw new ScanError('Body text contains NUL bytes; extraction produced binary data', { offset: nul });
    }

    return {
        [Symbol.iterator]: () => scanPass(bodyText),
    };
}

/**
 * One pass over the text. Each pattern keeps its next match at or after the
 * cursor; the earliest (then longest) one is emitted and the cursor jumps past
 * it, so nothing inside a matched span is considered again.
 */
function* scanPass(text: string): Generator<CitationMarker, void, undefined> {
    const patterns: CompiledPattern[] = MARKER_PATTERNS.map((pattern) => ({
        ...pattern,
        regex: new RegExp(pattern.source, 'gu'),
    }));
    const next: Array<RegExpExecArray | null | undefined> = patterns.map(() => undefined);
    let cursor = 0;

    while (cursor < text.length) {
        let best: { pattern: CompiledPattern; match: RegExpExecArray } | null = null;

        for (const [i, pattern] of patterns.entries()) {
            let match = next[i];
            if (match === undefined || (match !== null && match.index < cursor)) {
                pattern.regex.lastIndex = cursor;
                match = pattern.regex.exec(text);
                next[i] = match;
            }
            if (match === null) continue;

            if (
                best === null ||
                match.index < best.match.index ||
                (match.index === best.match.index && match[0].length > best.match[0].length)
            ) {
                best = { pattern, match };
            }
        }

        if (best === null) return;
        const { pattern, match } = best;

        yield toMarker(pattern, match);
        cursor = match.index + match[0].length;
    }
}

function toMarker(pattern: MarkerPattern, match: RegExpExecArray): CitationMarker {
    const rawText = match[0];
    const candidateKeys = pattern.family === 'numeric'
        ? extractNumericKeys(rawText)
        : extractAuthorYearKeys(rawText);

    let style: MarkerStyle;
    if (candidateKeys.length > 1) {
        style = MarkerStyle.MIXED;
    } else {
        style = pattern.family === 'numeric' ? MarkerStyle.NUMERIC : MarkerStyle.AUTHOR_YEAR;
    }

    return {
        rawText,
        startOffset: match.index,
        endOffset: match.index + rawText.length,
        style,
        candidateKeys,
    };
}

/**
 * "[1, 3-5]" → ["1", "3", "4", "5"]
 */
export function extractNumericKeys(rawText: string): string[] {
    const keys: string[] = [];

    for (const item of rawText.replace(/[[\]]/g, '').split(/[,;]/)) {
        const range = /^\s*(\d+)\s*[-–—]\s*(\d+)\s*$/.exec(item);
        if (range) {
            const low = parseInt(range[1] ?? '', 10);
            const high = parseInt(range[2] ?? '', 10);
            if (high >= low && high - low < MAX_RANGE_EXPANSION) {
                for (let n = low; n <= high; n++) keys.push(String(n));
            } else {
                keys.push(String(low), String(high));
            }
            continue;
        }

        const single = item.trim();
        if (/^\d+$/.test(single)) keys.push(String(parseInt(single, 10)));
    }

    return unique(keys);
}

/**
 * "(e.g., Smith et al., 2019, 2020a; Lee, 2021)" → ["Smith, 2019", "Smith, 2020a", "Lee, 2021"]
 * "van Dijk (2018)" → ["van Dijk, 2018"]
 */
export function extractAuthorYearKeys(rawText: string): string[] {
    const keys: string[] = [];

    for (const chunk of rawText.replace(/[()]/g, ' ').split(';')) {
        const citation = chunk.replace(CITATION_PREFIX_PATTERN, '');
        const years = [...citation.matchAll(YEAR_PATTERN)];
        const firstYear = years[0];
        if (!firstYear) continue;

        const name = NAME_PATTERN.exec(citation.slice(0, firstYear.index ?? 0));
        if (!name) continue;

        for (const year of years) {
            keys.push(`${name[0]}, ${year[0].replace(/\s+/g, '')}`);
        }
    }

    return unique(keys);
}

function unique(keys: string[]): string[] {
    return [...new Set(keys)];
}
