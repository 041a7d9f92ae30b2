/**
 * Surname handling shared by the reference index and the marker resolver.
 */

/** Lowercase name particles that belong to a surname ("van Dijk", "de la Cruz") */
export const NAME_PARTICLES: ReadonlySet<string> = new Set([
    'van', 'von', 'de', 'der', 'den', 'da', 'di', 'du', 'del', 'della', 'la', 'le', 'dos', 'das', 'ter', 'ten',
]);

const INITIALS_TOKEN = /^(?:\p{Lu}\.?-?){1,3}$/u;

/**
 * Normalize a surname for comparison.
 * "van Dijk" → "dijk", "Müller" → "muller", "O'Brien" → "obrien"
 */
export function normalizeSurname(name: string): string {
    const tokens = name
        .normalize('NFD')
        .replace(/\p{M}/gu, '')
        .toLowerCase()
        .split(/\s+/)
        .filter((token) => token.length > 0);

    while (tokens.length > 1 && NAME_PARTICLES.has(tokens[0] ?? '')) {
        tokens.shift();
    }

    return tokens.join('').replace(/[^\p{L}\p{N}]/gu, '');
}

/**
 * Extract the surname from one author as written in a bibliography.
 * "Smith, J. A." → "Smith", "J. Smith" → "Smith", "Smith J" → "Smith",
 * "van Dijk, T." → "van Dijk"
 */
export function surnameOf(author: string): string {
    const trimmed = author.trim();
    const comma = trimmed.indexOf(',');
    if (comma > 0) {
        return trimmed.slice(0, comma).trim();
    }

    const tokens = trimmed.split(/\s+/).filter((token) => token.length > 0 && !INITIALS_TOKEN.test(token));
    if (tokens.length === 0) return trimmed;

    // Keep particles attached to the last name token
    let start = tokens.length - 1;
    while (start > 0 && NAME_PARTICLES.has((tokens[start - 1] ?? '').toLowerCase())) {
        start--;
    }
    return tokens.slice(start).join(' ');
}

/**
 * Simple Levenshtein distance.
 */
export function levenshteinDistance(a: string, b: string): number {
    const m = a.length;
    const n = b.length;

    if (m === 0) return n;
    if (n === 0) return m;

    let previous = Array.from({ length: n + 1 }, (_, j) => j);

    for (let i = 1; i <= m; i++) {
        const current = [i];
        for (let j = 1; j <= n; j++) {
            const cost = a[i - 1] === b[j - 1] ? 0 : 1;
            current.push(Math.min(
                (previous[j] ?? 0) + 1,        // deletion
                (current[j - 1] ?? 0) + 1,     // insertion
                (previous[j - 1] ?? 0) + cost  // substitution
            ));
        }
        previous = current;
    }

    return previous[n] ?? 0;
}

/**
 * Normalized Levenshtein similarity of two surnames (0.0 to 1.0).
 */
export function surnameSimilarity(a: string, b: string): number {
    const normA = normalizeSurname(a);
    const normB = normalizeSurname(b);

    if (normA === normB) return 1.0;

    const maxLen = Math.max(normA.length, normB.length);
    if (maxLen === 0) return 1.0;

    return 1.0 - levenshteinDistance(normA, normB) / maxLen;
}
