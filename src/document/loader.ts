import { readFileSync } from 'node:fs';
import type { CitationDocument } from '../types/index.js';
import { CiteLensError } from '../utils/errors.js';
import { guessTitle, splitFullText } from './sections.js';

export interface DocumentSource {
    /** Full text with a references section */
    input?: string;
    /** Body text, paired with `bibliography` */
    body?: string;
    bibliography?: string;
    title?: string;
}

/**
 * Read the document named by the input options.
 *
 * @throws CiteLensError when neither a full-text file nor a body/bibliography pair is given
 */
export function loadDocument(source: DocumentSource): CitationDocument {
    if (source.input) {
        const fullText = readText(source.input);
        const { bodyText, bibliographyText } = splitFullText(fullText);
        return { bodyText, bibliographyText, title: source.title || guessTitle(fullText) };
    }

    if (source.body && source.bibliography) {
        const bodyText = readText(source.body);
        return {
            bodyText,
            bibliographyText: readText(source.bibliography),
            title: source.title || guessTitle(bodyText),
        };
    }

    throw new CiteLensError('Provide --input <file>, or both --body <file> and --bibliography <file>');
}

function readText(path: string): string {
    try {
        return readFileSync(path, 'utf-8').replace(/^\uFEFF/, '');
    } catch (error) {
        throw new CiteLensError(`Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`, { path });
    }
}
