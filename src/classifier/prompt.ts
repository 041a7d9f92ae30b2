import type { ClassifierRequest, ReferenceEntry } from '../types/index.js';

export const SYSTEM_PROMPT = 'You are a research assistant that analyzes academic citations.';

const MAX_HINT_CHARS = 300;
const MAX_TITLE_CHARS = 300;

/**
 * Compact "authors (year). title" description of a resolved reference.
 */
export function referenceHint(reference: ReferenceEntry | null): string | null {
    if (!reference) return null;

    const authors = reference.authors.length > 3
        ? `${reference.authors.slice(0, 3).join('; ')} et al.`
        : reference.authors.join('; ');
    const year = reference.year !== null ? `${reference.year}${reference.yearSuffix ?? ''}` : 'n.d.';
    const title = reference.title || reference.rawText;

    const hint = authors ? `${authors} (${year}). ${title}` : `(${year}) ${title}`;
    return truncate(hint.trim(), MAX_HINT_CHARS);
}

/**
 * Render the user prompt for one classification request.
 */
export function buildClassificationPrompt(request: ClassifierRequest): string {
    const lines: string[] = ['Analyze the following citation in its context.', ''];

    if (request.paperTitle) {
        lines.push(`Citing paper: ${truncate(request.paperTitle, MAX_TITLE_CHARS)}`);
    }
    lines.push(`Cited work: ${request.referenceHint ?? 'unknown (not found in the bibliography)'}`);
    lines.push('', 'Context:', `"${request.context}"`, '');
    lines.push(
        'Please provide:',
        '1. What the cited work contributes to the citing paper',
        '2. The purpose of the citation: SUPPORTING_EVIDENCE, CONTRAST, BACKGROUND, METHODOLOGY or OTHER',
        '3. The authors\' stance towards the cited work: AGREE, CRITIQUE, EXTEND or NEUTRAL',
        '4. Your confidence in this analysis, from 0 to 1',
        '',
        'Respond with a JSON object with the keys "contribution", "purpose", "stance" and "confidence".'
    );

    return lines.join('\n');
}

function truncate(text: string, max: number): string {
    return text.length <= max ? text : `${text.slice(0, max - 1)}…`;
}
