import type { ReferenceEntry } from '../types/index.js';
import { ParseError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { normalizeSurname, surnameOf } from './names.js';

// ─── Patterns ────────────────────────────────────────────

const HEADING_LINE = /^\s*(?:\d+\.?\s*)?(?:references|bibliography|works cited|literature cited|reference list)\s*:?\s*$/i;

/** "[3] ..." or "3. ..." at the start of a line */
const NUMBERED_START = /^\s*(?:\[(\d{1,4})\]|(\d{1,4})\.)\s+/;

/** Numbered list prefixes, one per form a list may use */
const NUMBER_FORMS: readonly RegExp[] = [/^\[(\d{1,4})\]\s+/, /^(\d{1,4})\.\s+/];

/** Largest step between consecutive entry numbers still read as the next entry */
const MAX_NUMBER_STEP = 5;

const PARTICLE = String.raw`(?:[Vv]an|[Vv]on|[Dd]e[lnr]?|[Dd][aiu]|[Ll][ae])`;
const SURNAME = String.raw`(?:${PARTICLE}\s+)*\p{Lu}[\p{L}'’-]+(?:\s+\p{Lu}[\p{L}'’-]+)*`;

/** A line opening like an author list: "Smith, J." / "van Dijk, T." / "De Silva, D." */
const AUTHOR_START = new RegExp(String.raw`^${SURNAME},\s+\p{Lu}\.`, 'u');

/** A line ending inside an author list: "Smith, J., Jones, A.," */
const OPEN_AUTHOR_LIST = /(?:,|&|\band)$/;

const YEAR = String.raw`(?:1[5-9]|20)\d{2}`;

/** "Author, A. (2020a). Title." */
const APA_ENTRY = new RegExp(String.raw`^(.+?)\s*\((${YEAR}|n\.\s?d\.)([a-z])?[^)]*\)\.?\s*(.*)$`, 'u');

/** "Author, A., 2020a. Title." */
const HARVARD_ENTRY = new RegExp(String.raw`^(.+?),?\s+(${YEAR})([a-z])?\.\s+(.+)$`, 'u');

/** 'A. Author and B. Author, "Title," Venue, 2020.' */
const IEEE_ENTRY = /^([^"“]+?),\s*["“]([^"”]+?),?["”](.*)$/u;

const ANY_YEAR = new RegExp(String.raw`\b(${YEAR})([a-z])?\b`, 'gu');
const HAS_YEAR = new RegExp(String.raw`\b${YEAR}[a-z]?\b|\bn\.\s?d\.`, 'u');

/** "Surname, I. I." author with initials, as in APA lists */
const APA_AUTHOR = new RegExp(String.raw`(${SURNAME}),\s*((?:\p{Lu}\.\s*-?\s*)+)`, 'gu');

const INITIALS_FIRST = /^(?:\p{Lu}\.\s*-?\s*)+\p{Lu}/u;

interface ParsedFields {
    number: number | null;
    authors: string[];
    year: number | null;
    yearSuffix: string | null;
    title: string;
}

// ─── Index ───────────────────────────────────────────────

/**
 * Lookup structure over the parsed bibliography. Read-only once built.
 */
export class ReferenceIndex {
    private readonly byKey = new Map<string, ReferenceEntry>();
    private readonly byNumber = new Map<number, ReferenceEntry>();
    private readonly bySurnameYear = new Map<string, ReferenceEntry[]>();

    constructor(readonly entries: readonly ReferenceEntry[]) {
        for (const entry of entries) {
            this.byKey.set(entry.key, entry);

            if (entry.number !== null && !this.byNumber.has(entry.number)) {
                this.byNumber.set(entry.number, entry);
            }

            const firstSurname = entry.surnames[0];
            if (firstSurname) {
                const lookupKey = surnameYearKey(firstSurname, entry.year);
                const bucket = this.bySurnameYear.get(lookupKey) ?? [];
                bucket.push(entry);
                this.bySurnameYear.set(lookupKey, bucket);
            }
        }
    }

    get size(): number {
        return this.entries.length;
    }

    findByKey(key: string): ReferenceEntry | undefined {
        return this.byKey.get(key);
    }

    findByNumber(n: number): ReferenceEntry | undefined {
        return this.byNumber.get(n);
    }

    /**
     * Single entry for a first-author surname and year. With a suffix, only the
     * entry carrying that suffix matches. Returns undefined when zero or
     * several entries match.
     */
    findByAuthorYear(surname: string, year: number | null, suffix?: string | null): ReferenceEntry | undefined {
        let candidates = this.candidatesByAuthorYear(surname, year);
        if (suffix) {
            candidates = candidates.filter((entry) => entry.yearSuffix === suffix);
        }
        return candidates.length === 1 ? candidates[0] : undefined;
    }

    /**
     * Every entry whose first author and year match, in document order.
     */
    candidatesByAuthorYear(surname: string, year: number | null): readonly ReferenceEntry[] {
        return this.bySurnameYear.get(surnameYearKey(normalizeSurname(surname), year)) ?? [];
    }
}

function surnameYearKey(normalizedSurname: string, year: number | null): string {
    return `${normalizedSurname}|${year ?? 'nd'}`;
}

// ─── Build ───────────────────────────────────────────────

/**
 * Parse bibliography text into a ReferenceIndex.
 *
 * Numbered lists are split at their "[n]" / "n." prefixes; author-year lists at
 * blank lines and at lines that open like an author list. Entries that match
 * no known layout are kept with only `rawText`.
 *
 * @throws ParseError when no recognizable entry is found
 */
export function buildReferenceIndex(bibliographyText: string): ReferenceIndex {
    const rawEntries = splitEntries(bibliographyText);
    if (rawEntries.length === 0) {
        throw new ParseError('Bibliography is empty', { length: bibliographyText.length });
    }

    const usedKeys = new Set<string>();
    const entries: ReferenceEntry[] = [];
    let recognized = 0;

    rawEntries.forEach((rawText, position) => {
        const fields = parseEntryFields(rawText);
        const isRecognized = fields.number !== null || fields.authors.length > 0 || fields.year !== null;
        if (isRecognized) recognized++;

        const key = uniqueKey(baseKey(fields, position), usedKeys);
        entries.push(Object.freeze({
            key,
            number: fields.number,
            authors: Object.freeze([...fields.authors]),
            surnames: Object.freeze(fields.authors.map((author) => normalizeSurname(surnameOf(author)))),
            year: fields.year,
            yearSuffix: fields.yearSuffix,
            title: fields.title,
            rawText,
            position,
        }));
    });

    if (recognized === 0) {
        throw new ParseError('No recognizable bibliography entries found', { candidates: rawEntries.length });
    }

    getLogger().debug({ entries: entries.length, recognized }, 'Reference index built');
    return new ReferenceIndex(entries);
}

/**
 * Split bibliography text into one string per entry (whitespace collapsed).
 *
 * A list is numbered when its "[n]" or "n." prefixes run in sequence over
 * several lines (or open the text); lines before the first numbered entry
 * form an entry of their own. Otherwise entries are split at blank lines and
 * at lines that open like an author list, unless the entry so far still
 * lacks a year and the line does not bring one, or the previous line ends
 * inside an author list.
 */
export function splitEntries(bibliographyText: string): string[] {
    const lines = bibliographyText
        .split(/\r?\n/)
        .filter((line) => !HEADING_LINE.test(line))
        .map((line) => line.trim());

    const groups = splitNumbered(lines) ?? splitAuthorYear(lines);

    return groups
        .map((group) => group.join(' ').replace(/\s+/g, ' ').trim())
        .filter((entry) => entry.length > 0);
}

function splitNumbered(lines: string[]): string[][] | null {
    const content = lines.filter((line) => line.length > 0);
    if (content.length === 0) return null;

    for (const form of NUMBER_FORMS) {
        const starts = numberedStarts(content, form);
        if (starts.size < 2 && !starts.has(0)) continue;

        const groups: string[][] = [];
        let current: string[] = [];
        for (const [i, line] of content.entries()) {
            if (starts.has(i) && current.length > 0) {
                groups.push(current);
                current = [];
            }
            current.push(line);
        }
        if (current.length > 0) groups.push(current);
        return groups;
    }

    return null;
}

/**
 * Indices of lines that open the next entry of a numbered list. Numbers must
 * increase by at most MAX_NUMBER_STEP, and year-like numbers ("2019. ") never
 * open an entry.
 */
function numberedStarts(lines: string[], form: RegExp): Set<number> {
    const starts = new Set<number>();
    let previous: number | null = null;

    for (const [i, line] of lines.entries()) {
        const match = form.exec(line);
        if (!match) continue;

        const n = parseInt(match[1] ?? '', 10);
        if (n >= 1500 && n <= 2099) continue;
        if (previous !== null && (n <= previous || n - previous > MAX_NUMBER_STEP)) continue;

        starts.add(i);
        previous = n;
    }

    return starts;
}

function splitAuthorYear(lines: string[]): string[][] {
    const groups: string[][] = [];
    let current: string[] = [];
    let previousBlank = true;

    for (const line of lines) {
        if (line.length === 0) {
            previousBlank = true;
            continue;
        }

        const previousLine = current[current.length - 1];
        const startsEntry = previousBlank || (
            AUTHOR_START.test(line) &&
            !(previousLine !== undefined && OPEN_AUTHOR_LIST.test(previousLine)) &&
            (HAS_YEAR.test(current.join(' ')) || HAS_YEAR.test(line))
        );

        if (startsEntry && current.length > 0) {
            groups.push(current);
            current = [];
        }
        current.push(line);
        previousBlank = false;
    }
    if (current.length > 0) groups.push(current);

    return groups;
}

/**
 * Extract number, authors, year and title from one entry.
 */
export function parseEntryFields(rawText: string): ParsedFields {
    let body = rawText.replace(/\s+/g, ' ').trim();
    let number: number | null = null;

    const numbered = NUMBERED_START.exec(body);
    if (numbered) {
        number = parseInt(numbered[1] ?? numbered[2] ?? '', 10);
        body = body.slice(numbered[0].length);
    }

    const apa = APA_ENTRY.exec(body);
    if (apa) {
        const yearText = apa[2] ?? '';
        return {
            number,
            authors: parseAuthors(apa[1] ?? ''),
            year: /^\d{4}$/.test(yearText) ? parseInt(yearText, 10) : null,
            yearSuffix: apa[3] ?? null,
            title: firstSentence(apa[4] ?? ''),
        };
    }

    const harvard = HARVARD_ENTRY.exec(body);
    if (harvard) {
        return {
            number,
            authors: parseAuthors(harvard[1] ?? ''),
            year: parseInt(harvard[2] ?? '', 10),
            yearSuffix: harvard[3] ?? null,
            title: firstSentence(harvard[4] ?? ''),
        };
    }

    const ieee = IEEE_ENTRY.exec(body);
    if (ieee) {
        const year = lastYear(ieee[3] ?? '');
        return {
            number,
            authors: parseAuthors(ieee[1] ?? ''),
            year: year?.year ?? null,
            yearSuffix: year?.suffix ?? null,
            title: (ieee[2] ?? '').trim(),
        };
    }

    const year = lastYear(body);
    return {
        number,
        authors: [],
        year: year?.year ?? null,
        yearSuffix: year?.suffix ?? null,
        title: '',
    };
}

/**
 * Split an author list into individual authors.
 * "Smith, J., Jones, A. B., & Lee, K." → ["Smith, J.", "Jones, A. B.", "Lee, K."]
 * "J. Smith and A. Jones" → ["J. Smith", "A. Jones"]
 */
export function parseAuthors(authorsText: string): string[] {
    const cleaned = authorsText
        .replace(/,?\s*(?:et\s+al\.?|and\s+others)\s*$/i, '')
        .replace(/\s*(?:&|\band\b)\s*/g, ', ')
        .trim();

    // "J. Smith" lists put initials first; only "Smith, J." lists are read pairwise
    if (!INITIALS_FIRST.test(cleaned)) {
        const withInitials = [...cleaned.matchAll(APA_AUTHOR)].map(
            (match) => `${(match[1] ?? '').trim()}, ${(match[2] ?? '').replace(/\s+/g, ' ').trim()}`
        );
        if (withInitials.length > 0) return withInitials;
    }

    return cleaned
        .split(/[,;]/)
        .map((author) => author.trim())
        .filter((author) => /\p{L}{2,}/u.test(author));
}

// ─── Helpers ─────────────────────────────────────────────

function firstSentence(text: string): string {
    const trimmed = text.trim();
    const end = trimmed.search(/[.?!](?:\s|$)/);
    const sentence = end >= 0 ? trimmed.slice(0, end + 1) : trimmed;
    return sentence.replace(/\.$/, '').trim();
}

function lastYear(text: string): { year: number; suffix: string | null } | null {
    let found: { year: number; suffix: string | null } | null = null;
    for (const match of text.matchAll(ANY_YEAR)) {
        found = { year: parseInt(match[1] ?? '', 10), suffix: match[2] ?? null };
    }
    return found;
}

function baseKey(fields: ParsedFields, position: number): string {
    if (fields.number !== null) return String(fields.number);

    const firstAuthor = fields.authors[0];
    if (firstAuthor && fields.year !== null) {
        return `${surnameOf(firstAuthor)}, ${fields.year}${fields.yearSuffix ?? ''}`;
    }
    if (firstAuthor) {
        return `${surnameOf(firstAuthor)}, n.d.`;
    }
    return `ref-${position + 1}`;
}

function uniqueKey(key: string, used: Set<string>): string {
    let candidate = key;
    let counter = 2;
    while (used.has(candidate)) {
        candidate = `${key} (${counter})`;
        counter++;
    }
    used.add(candidate);
    return candidate;
}
