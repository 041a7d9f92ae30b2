import { getLogger } from '../utils/logger.js';

// Common headings for reference sections, alone on their line
const REFERENCES_HEADING = /^[ \t]*(?:\d+\.?[ \t]*)?(?:references|bibliography|works cited|literature cited|reference list)[ \t]*:?[ \t]*$/gim;

// Back matter that may follow the reference list
const TRAILING_SECTION = /^[ \t]*(?:[A-Z]\.?[ \t]+)?(?:appendix|appendices|supplementary (?:material|information)|acknowledg(?:e)?ments)\b.*$/im;

export interface DocumentSections {
    bodyText: string;
    bibliographyText: string;
}

/**
 * Split one full-text stream into body and bibliography at the last
 * references heading. Back matter after the reference list is dropped.
 * Without a heading the whole stream is body and the bibliography is empty.
 */
export function splitFullText(fullText: string): DocumentSections {
    let heading: RegExpMatchArray | null = null;
    for (const match of fullText.matchAll(REFERENCES_HEADING)) {
        heading = match;
    }

    if (!heading) {
        getLogger().warn('No references heading found in full text');
        return { bodyText: fullText, bibliographyText: '' };
    }

    const headingStart = heading.index ?? 0;
    const bodyText = fullText.slice(0, headingStart);
    let bibliographyText = fullText.slice(headingStart + heading[0].length);

    const trailing = TRAILING_SECTION.exec(bibliographyText);
    if (trailing) {
        bibliographyText = bibliographyText.slice(0, trailing.index);
    }

    getLogger().debug({ bodyChars: bodyText.length, bibliographyChars: bibliographyText.length }, 'Full text split');
    return { bodyText, bibliographyText };
}

/**
 * Best-effort title: the first non-empty line that reads like a heading.
 */
export function guessTitle(fullText: string): string {
    for (const line of fullText.split(/\r?\n/).slice(0, 20)) {
        const trimmed = line.trim();
        if (trimmed.length === 0) continue;
        if (trimmed.length > 200 || /[.:;]$/.test(trimmed) || !/\p{L}/u.test(trimmed)) return '';
        return trimmed;
    }
    return '';
}
