/**
 * ReferenceEntry — one parsed record of the host paper's bibliography.
 * Entries are frozen once the index is built and shared by every citation
 * that resolves to them.
 */
export interface ReferenceEntry {
    /** Citation key, unique within the document ("3", "Lee, 2021a", "ref-7") */
    readonly key: string;

    /** Entry number for numbered bibliographies ([3] or 3.) */
    readonly number: number | null;

    /** Author names in bibliography order, as written */
    readonly authors: readonly string[];

    /** Normalized surnames, parallel to `authors` */
    readonly surnames: readonly string[];

    /** Publication year (null for n.d. or when not found) */
    readonly year: number | null;

    /** Disambiguation letter following the year (the "a" in 2021a) */
    readonly yearSuffix: string | null;

    /** Title, or empty string when the entry could not be parsed */
    readonly title: string;

    /** Original bibliography text of the entry */
    readonly rawText: string;

    /** 0-based position in the bibliography */
    readonly position: number;
}
