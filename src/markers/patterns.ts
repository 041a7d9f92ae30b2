/**
 * Marker pattern library. Fragments are composed into full patterns so the
 * scanner and the key extractor agree on what a name or a year looks like.
 */

/** Surname particles, lowercase or capitalized at the start of a name: "van", "De" */
const PARTICLE = String.raw`(?:[Vv]an|[Vv]on|[Dd]e[lnr]?|[Dd][aiu]|[Ll][ae])`;
const WORD = String.raw`\p{Lu}[\p{L}'’-]+`;

/** A capitalized surname, optionally preceded by particles: "Smith", "van Dijk", "De Silva", "O'Neil" */
const NAME = String.raw`(?:${PARTICLE}\s+)*${WORD}`;

/**
 * Inside parentheses a surname may also run to a second capitalized word
 * ("Garcia Marquez"). Narrative markers keep to NAME so a preceding
 * capitalized word is not taken for part of the surname.
 */
const COMPOUND_NAME = String.raw`${NAME}(?:\s+${WORD})?`;

/** "2020", "2020a", "n.d." */
const YEAR = String.raw`(?:(?:1[5-9]|20)\d{2}[a-z]?|n\.\s?d\.)`;

const YEARS = String.raw`${YEAR}(?:\s*,\s*${YEAR})*`;
const LOCATOR = String.raw`(?:,\s*(?:p|pp|ch|sec|chap)\.\s*\d+(?:\s*[-–]\s*\d+)?)`;
const PREFIX = String.raw`(?:(?:[Ee]\.g\.|[Ii]\.e\.|[Ss]ee(?:\s+also)?|[Cc]f\.|[Ff]or\s+(?:example|instance)|[Bb]ut\s+see),?\s+)`;
const AUTHOR_SEPARATOR = String.raw`(?:\s*,\s*(?:and\s+|&\s*)?|\s+(?:and|&)\s+)`;
const AUTHORS = String.raw`${COMPOUND_NAME}(?:${AUTHOR_SEPARATOR}${COMPOUND_NAME})*(?:,?\s+et\s+al\.?)?`;
const NARRATIVE_AUTHORS = String.raw`${NAME}(?:\s+(?:and|&)\s+${NAME})?(?:,?\s+et\s+al\.?)?`;
const CITATION = String.raw`${PREFIX}?${AUTHORS},?\s+${YEARS}${LOCATOR}?`;
/** A reference number; year-like numbers ("[2020]") are not citations */
const NUMBER = String.raw`(?!(?:1[5-9]|20)\d{2}(?!\d))\d{1,4}`;
const NUMBER_ITEM = String.raw`${NUMBER}(?:\s*[-–—]\s*${NUMBER})?`;

export type PatternFamily = 'numeric' | 'author-year';

export interface MarkerPattern {
    name: string;
    family: PatternFamily;
    source: string;
}

/**
 * Ordered pattern set. At equal start offsets the longest match wins; on equal
 * length, the earlier pattern.
 */
export const MARKER_PATTERNS: readonly MarkerPattern[] = [
    { name: 'numeric-bracket', family: 'numeric', source: String.raw`\[\s*${NUMBER}\s*\]` },
    { name: 'numeric-bracket-list', family: 'numeric', source: String.raw`\[\s*${NUMBER_ITEM}(?:\s*[,;]\s*${NUMBER_ITEM})*\s*\]` },
    { name: 'author-year', family: 'author-year', source: String.raw`\(\s*${CITATION}\s*\)` },
    { name: 'author-year-list', family: 'author-year', source: String.raw`\(\s*${CITATION}(?:\s*;\s*${CITATION})+\s*\)` },
    { name: 'narrative', family: 'author-year', source: String.raw`(?<![\p{L}\p{N}])${NARRATIVE_AUTHORS}\s+\(\s*${YEARS}${LOCATOR}?\s*\)` },
];

export const NAME_PATTERN = new RegExp(COMPOUND_NAME, 'u');
export const YEAR_PATTERN = new RegExp(YEAR, 'gu');
export const CITATION_PREFIX_PATTERN = new RegExp(String.raw`^\s*${PREFIX}`, 'u');
