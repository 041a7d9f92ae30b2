import { describe, it, expect } from 'vitest';
import { resolveMarker, parseAuthorYearKey } from '../markers/resolver.js';
import { scanMarkers } from '../markers/scanner.js';
import { buildReferenceIndex } from '../references/reference-index.js';
import { ResolutionConfidence } from '../types/index.js';

const AUTHOR_YEAR_INDEX = buildReferenceIndex(`Hanson, R. (2019). Tie one.
Hansen, M. (2019). Tie two.
Johnson, P. (2019). Misspelled author study.
Lee, K. (2021a). First Lee paper.
Lee, K. (2021b). Second Lee paper.
Smith, J. (2020). Only Smith paper.
van Dijk, T. (2018). Discourse and context.
`);

const NUMERIC_INDEX = buildReferenceIndex(`[1] A. One, "First," 2019.
[2] B. Two, "Second," 2020.
`);

function resolveText(text: string, index = AUTHOR_YEAR_INDEX) {
    const [marker] = [...scanMarkers(text)];
    if (!marker) throw new Error(`No marker in ${text}`);
    return resolveMarker(marker, index);
}

describe('Marker Resolver', () => {
    describe('author-year', () => {
        it('should resolve an exact key with a suffix', () => {
            const [result] = resolveText('(Lee, 2021a)');
            expect(result?.confidence).toBe(ResolutionConfidence.EXACT);
            expect(result?.reference?.key).toBe('Lee, 2021a');
            expect(result?.ambiguity).toBeNull();
        });

        it('should resolve particle surnames exactly', () => {
            const [result] = resolveText('van Dijk (2018)');
            expect(result?.confidence).toBe(ResolutionConfidence.EXACT);
            expect(result?.reference?.key).toBe('van Dijk, 2018');
        });

        it('should pick the first of several same-author-year entries and flag it', () => {
            const [result] = resolveText('(Lee, 2021)');
            expect(result?.confidence).toBe(ResolutionConfidence.FUZZY);
            expect(result?.reference?.key).toBe('Lee, 2021a');
            expect(result?.ambiguity?.kind).toBe('same-author-year');
            expect(result?.ambiguity?.message).toBe(
                '"Lee, 2021" matches 2 entries (Lee, 2021a; Lee, 2021b); using "Lee, 2021a"'
            );
        });

        it('should resolve a misspelled surname by similarity', () => {
            const [result] = resolveText('(Johnsen, 2019)');
            expect(result?.confidence).toBe(ResolutionConfidence.FUZZY);
            expect(result?.reference?.key).toBe('Johnson, 2019');
            expect(result?.ambiguity).toBeNull();
        });

        it('should break similarity ties by document order', () => {
            const [result] = resolveText('(Hansan, 2019)');
            expect(result?.confidence).toBe(ResolutionConfidence.FUZZY);
            expect(result?.reference?.key).toBe('Hanson, 2019');
            expect(result?.ambiguity?.kind).toBe('fuzzy-tie');
            expect(result?.ambiguity?.matchedKeys).toEqual(['Hanson, 2019', 'Hansen, 2019']);
        });

        it('should treat a suffix missing from the only candidate as fuzzy', () => {
            const [result] = resolveText('(Smith, 2020c)');
            expect(result?.confidence).toBe(ResolutionConfidence.FUZZY);
            expect(result?.reference?.key).toBe('Smith, 2020');
        });

        it('should leave unknown works unresolved', () => {
            const [result] = resolveText('(Doe, 1999)');
            expect(result).toMatchObject({
                candidateKey: 'Doe, 1999',
                reference: null,
                confidence: ResolutionConfidence.UNRESOLVED,
                ambiguity: null,
            });
        });

        it('should fuzzy-match across years and record the mismatch', () => {
            const [result] = resolveText('(Johnson, 2021)');
            expect(result?.confidence).toBe(ResolutionConfidence.FUZZY);
            expect(result?.reference?.key).toBe('Johnson, 2019');
            expect(result?.ambiguity?.kind).toBe('year-mismatch');
            expect(result?.ambiguity?.message).toBe('"Johnson, 2021" matches no entry from its year; using "Johnson, 2019"');
        });

        it('should resolve a misspelled surname from another year', () => {
            const [result] = resolveText('(Smyth, 2021)');
            expect(result?.confidence).toBe(ResolutionConfidence.FUZZY);
            expect(result?.reference?.key).toBe('Smith, 2020');
            expect(result?.ambiguity?.kind).toBe('year-mismatch');
        });

        it('should prefer an entry from the same year among equally similar ones', () => {
            const index = buildReferenceIndex('Smith, J. (2019). Older paper.\nSmyth, K. (2020). Newer paper.\n');
            const [result] = resolveText('(Smeth, 2020)', index);
            expect(result?.confidence).toBe(ResolutionConfidence.FUZZY);
            expect(result?.reference?.key).toBe('Smyth, 2020');
            expect(result?.ambiguity).toBeNull();
        });

        it('should fuzzy-match entries without a year', () => {
            const index = buildReferenceIndex('Doe, J. (n.d.). Undated report.\n');
            const [result] = resolveText('(Doe, 2020)', index);
            expect(result?.reference?.key).toBe('Doe, n.d.');
            expect(result?.ambiguity?.kind).toBe('year-mismatch');
        });

        it('should resolve capitalized particles and multi-word surnames', () => {
            const index = buildReferenceIndex(
                'De Silva, D. N. (2020). Graph methods for papers.\nVan Dijk, T. (2018). Discourse and context.\n'
            );
            const results = [...scanMarkers('Graphs help (De Silva, 2020). Also (Van Dijk, 2018).')].flatMap((marker) =>
                resolveMarker(marker, index)
            );

            expect(results.map((r) => [r.candidateKey, r.reference?.key, r.confidence])).toEqual([
                ['De Silva, 2020', 'De Silva, 2020', ResolutionConfidence.EXACT],
                ['Van Dijk, 2018', 'Van Dijk, 2018', ResolutionConfidence.EXACT],
            ]);
        });
    });

    describe('numeric', () => {
        it('should resolve a number exactly', () => {
            const [result] = resolveText('See [2].', NUMERIC_INDEX);
            expect(result?.confidence).toBe(ResolutionConfidence.EXACT);
            expect(result?.reference?.key).toBe('2');
        });

        it('should leave missing numbers unresolved', () => {
            const [result] = resolveText('See [7].', NUMERIC_INDEX);
            expect(result?.confidence).toBe(ResolutionConfidence.UNRESOLVED);
            expect(result?.candidateKey).toBe('7');
        });

        it('should return one result per key of a list marker, sharing the marker', () => {
            const results = resolveText('See [1, 2].', NUMERIC_INDEX);
            expect(results.map((r) => r.reference?.key)).toEqual(['1', '2']);
            expect(results.every((r) => r.confidence === ResolutionConfidence.EXACT)).toBe(true);
            expect(results[0]?.marker).toBe(results[1]?.marker);
        });
    });

    describe('parseAuthorYearKey', () => {
        it('should split surname, year and suffix', () => {
            expect(parseAuthorYearKey('Smith, 2020a')).toEqual({ surname: 'Smith', year: 2020, suffix: 'a' });
            expect(parseAuthorYearKey('van Dijk, 2018')).toEqual({ surname: 'van Dijk', year: 2018, suffix: null });
        });

        it('should accept n.d. and reject malformed keys', () => {
            expect(parseAuthorYearKey('Doe, n.d.')).toEqual({ surname: 'Doe', year: null, suffix: null });
            expect(parseAuthorYearKey('Smith 2020')).toBeNull();
        });
    });
});
