import type { AmbiguityKind, ResolutionAmbiguityRecord } from '../types/index.js';

/**
 * Base class for every error citelens raises.
 */
export class CiteLensError extends Error {
    constructor(message: string, public readonly details?: Record<string, unknown>) {
        super(message);
        this.name = 'CiteLensError';
    }
}

/**
 * The bibliography yielded no recognizable entry. Fatal for the document.
 */
export class ParseError extends CiteLensError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, details);
        this.name = 'ParseError';
    }
}

/**
 * The body text cannot be scanned. Fatal for the document.
 */
export class ScanError extends CiteLensError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, details);
        this.name = 'ScanError';
    }
}

/**
 * A citation key resolved to a guess: it matched several entries, or only an
 * entry from another year. Never thrown: it is recorded on the resolved
 * citation and carried into the report.
 */
export class ResolutionAmbiguous extends CiteLensError implements ResolutionAmbiguityRecord {
    constructor(
        public readonly kind: AmbiguityKind,
        public readonly candidateKey: string,
        public readonly matchedKeys: readonly string[]
    ) {
        super(ambiguityMessage(kind, candidateKey, matchedKeys), {
            kind,
            candidateKey,
            matchedKeys: [...matchedKeys],
        });
        this.name = 'ResolutionAmbiguous';
    }
}

function ambiguityMessage(kind: AmbiguityKind, candidateKey: string, matchedKeys: readonly string[]): string {
    const using = `using "${matchedKeys[0] ?? ''}"`;
    switch (kind) {
        case 'same-author-year':
            return `"${candidateKey}" matches ${matchedKeys.length} entries (${matchedKeys.join('; ')}); ${using}`;
        case 'fuzzy-tie':
            return `"${candidateKey}" is equally similar to ${matchedKeys.length} entries (${matchedKeys.join('; ')}); ${using}`;
        case 'year-mismatch':
            return `"${candidateKey}" matches no entry from its year; ${using}`;
    }
}

/**
 * The classifier answered, but not with a usable analysis.
 */
export class ClassifierError extends CiteLensError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, details);
        this.name = 'ClassifierError';
    }
}

/**
 * The classifier could not be reached (transport or service failure).
 */
export class ClassifierUnavailableError extends CiteLensError {
    constructor(
        message: string,
        public readonly status?: number,
        details?: Record<string, unknown>
    ) {
        super(message, details);
        this.name = 'ClassifierUnavailableError';
    }
}
