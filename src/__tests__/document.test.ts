import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { splitFullText, guessTitle } from '../document/sections.js';
import { loadDocument } from '../document/loader.js';
import { CiteLensError } from '../utils/errors.js';

const FULL_TEXT = 'Title\n\nBody text [1].\n\nReferences\n[1] A. One, "First," 2019.\n\nAppendix A\nExtra material.';

describe('splitFullText', () => {
    it('should split at the references heading and drop back matter', () => {
        expect(splitFullText(FULL_TEXT)).toEqual({
            bodyText: 'Title\n\nBody text [1].\n\n',
            bibliographyText: '\n[1] A. One, "First," 2019.\n\n',
        });
    });

    it('should split at the last heading', () => {
        const text = 'Intro mentions\nReferences\nin passing.\n\nBibliography\nLee, K. (2021). Paper.';
        expect(splitFullText(text).bibliographyText).toBe('\nLee, K. (2021). Paper.');
    });

    it('should treat the whole text as body without a heading', () => {
        expect(splitFullText('Just body text (Smith, 2020).')).toEqual({
            bodyText: 'Just body text (Smith, 2020).',
            bibliographyText: '',
        });
    });
});

describe('guessTitle', () => {
    it('should take the first non-empty line', () => {
        expect(guessTitle('\n\n  Deep Citation Analysis  \nBody starts here.')).toBe('Deep Citation Analysis');
    });

    it('should reject lines that read like prose', () => {
        expect(guessTitle('This paper studies citations.\nMore.')).toBe('');
        expect(guessTitle('12345\nText')).toBe('');
    });
});

describe('loadDocument', () => {
    let tmpDir: string;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'citelens-doc-'));
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should load a full-text file and strip the byte order mark', () => {
        const input = path.join(tmpDir, 'paper.txt');
        fs.writeFileSync(input, '\uFEFFTitle line\n\nText (Smith, 2020).\n\nReferences\nSmith, J. (2020). Paper.\n');

        expect(loadDocument({ input })).toEqual({
            bodyText: 'Title line\n\nText (Smith, 2020).\n\n',
            bibliographyText: '\nSmith, J. (2020). Paper.\n',
            title: 'Title line',
        });
    });

    it('should load a body and bibliography pair with an explicit title', () => {
        const body = path.join(tmpDir, 'body.txt');
        const bibliography = path.join(tmpDir, 'refs.txt');
        fs.writeFileSync(body, 'Text (Smith, 2020).');
        fs.writeFileSync(bibliography, 'Smith, J. (2020). Paper.');

        expect(loadDocument({ body, bibliography, title: 'Given title' })).toEqual({
            bodyText: 'Text (Smith, 2020).',
            bibliographyText: 'Smith, J. (2020). Paper.',
            title: 'Given title',
        });
    });

    it('should require an input source', () => {
        expect(() => loadDocument({ body: 'only-body.txt' })).toThrow(
            'Provide --input <file>, or both --body <file> and --bibliography <file>'
        );
    });

    it('should report unreadable files', () => {
        const input = path.join(tmpDir, 'missing.txt');
        expect(() => loadDocument({ input })).toThrow(CiteLensError);
        expect(() => loadDocument({ input })).toThrow(`Cannot read ${input}`);
    });
});
