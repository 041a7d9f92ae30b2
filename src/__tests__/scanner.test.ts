import { describe, it, expect } from 'vitest';
import { scanMarkers, extractAuthorYearKeys, extractNumericKeys } from '../markers/scanner.js';
import { MarkerStyle } from '../types/index.js';
import { ScanError } from '../utils/errors.js';

function scan(text: string) {
    return [...scanMarkers(text)];
}

describe('Marker Scanner', () => {
    describe('numeric markers', () => {
        it('should find a bracketed number with exact offsets', () => {
            const [marker] = scan('Prior work [3] showed this.');
            expect(marker).toEqual({
                rawText: '[3]',
                startOffset: 11,
                endOffset: 14,
                style: MarkerStyle.NUMERIC,
                candidateKeys: ['3'],
            });
        });

        it('should expand ranges in numeric lists and tag them MIXED', () => {
            const [marker] = scan('Several studies [1, 3-5] agree.');
            expect(marker?.rawText).toBe('[1, 3-5]');
            expect(marker?.style).toBe(MarkerStyle.MIXED);
            expect(marker?.candidateKeys).toEqual(['1', '3', '4', '5']);
        });

        it('should not take bracketed years for reference numbers', () => {
            expect(scan('Published [2020] and cited [12].').map((m) => m.rawText)).toEqual(['[12]']);
            expect(scan('Between [1999-2001] only.')).toEqual([]);
        });

        it('should keep only the endpoints of very long ranges', () => {
            expect(extractNumericKeys('[1-200]')).toEqual(['1', '200']);
        });
    });

    describe('author-year markers', () => {
        it('should find a parenthetical citation', () => {
            const [marker] = scan('As shown (Smith, 2020) before.');
            expect(marker?.rawText).toBe('(Smith, 2020)');
            expect(marker?.startOffset).toBe(9);
            expect(marker?.style).toBe(MarkerStyle.AUTHOR_YEAR);
            expect(marker?.candidateKeys).toEqual(['Smith, 2020']);
        });

        it('should treat a semicolon list as one MIXED marker', () => {
            const markers = scan('Both groups (Lee, 2019; Kim, 2020) found it.');
            expect(markers).toHaveLength(1);
            expect(markers[0]?.style).toBe(MarkerStyle.MIXED);
            expect(markers[0]?.candidateKeys).toEqual(['Lee, 2019', 'Kim, 2020']);
        });

        it('should find narrative citations with et al. and particles', () => {
            const markers = scan('Smith et al. (2019) proposed it, and van Dijk (2018) agreed.');
            expect(markers.map((m) => m.rawText)).toEqual(['Smith et al. (2019)', 'van Dijk (2018)']);
            expect(markers.map((m) => m.candidateKeys)).toEqual([['Smith, 2019'], ['van Dijk, 2018']]);
        });

        it('should find parenthetical citations with multi-word surnames', () => {
            const markers = scan('Graphs help (De Silva, 2020). Also (Van Dijk, 2018) and (Garcia Marquez, 2019).');
            expect(markers.map((m) => m.rawText)).toEqual(['(De Silva, 2020)', '(Van Dijk, 2018)', '(Garcia Marquez, 2019)']);
            expect(markers.map((m) => m.candidateKeys)).toEqual([
                ['De Silva, 2020'],
                ['Van Dijk, 2018'],
                ['Garcia Marquez, 2019'],
            ]);
        });

        it('should find narrative citations with a capitalized particle', () => {
            const [marker] = scan('In De Silva (2020) the graph is built.');
            expect(marker?.rawText).toBe('De Silva (2020)');
            expect(marker?.startOffset).toBe(3);
            expect(marker?.candidateKeys).toEqual(['De Silva, 2020']);
        });

        it('should strip prefixes and expand several years of one author', () => {
            expect(extractAuthorYearKeys('(e.g., Smith et al., 2019, 2020a; Lee, 2021)')).toEqual([
                'Smith, 2019',
                'Smith, 2020a',
                'Lee, 2021',
            ]);
        });
    });

    describe('iteration', () => {
        const text = 'First [1] then (Smith, 2020) and finally [2].';

        it('should emit markers in order without overlap', () => {
            const markers = scan(text);
            expect(markers.map((m) => m.rawText)).toEqual(['[1]', '(Smith, 2020)', '[2]']);
            for (const [i, marker] of markers.entries()) {
                if (i === 0) continue;
                expect(marker.startOffset).toBeGreaterThanOrEqual(markers[i - 1]?.endOffset ?? 0);
            }
        });

        it('should be restartable', () => {
            const markers = scanMarkers(text);
            expect([...markers]).toEqual([...markers]);
        });

        it('should return nothing for text without markers', () => {
            expect(scan('No citations here (not even 12 of them).')).toEqual([]);
        });
    });

    it('should throw ScanError for text containing NUL bytes', () => {
        expect(() => scanMarkers('binary\u0000data')).toThrow(ScanError);
    });
});
