/**
 * Sentence segmentation for context windows.
 *
 * A sentence ends at ".", "?" or "!" (plus closing quotes/brackets) followed by
 * whitespace and an uppercase letter, unless the period closes an abbreviation
 * or an initial. A blank line always ends both a sentence and a paragraph.
 */

export interface SentenceSpan {
    /** Offset of the first non-whitespace character */
    start: number;
    /** Offset just past the last non-whitespace character */
    end: number;
    /** 0-based paragraph index */
    paragraph: number;
}

/** Lowercase, without the trailing period */
const ABBREVIATIONS: ReadonlySet<string> = new Set([
    'al', 'e.g', 'i.e', 'cf', 'vs', 'viz', 'fig', 'figs', 'eq', 'eqs', 'sec', 'secs', 'tab',
    'ref', 'refs', 'no', 'nos', 'vol', 'vols', 'pp', 'p', 'ch', 'chap', 'ed', 'eds', 'approx',
    'dr', 'mr', 'mrs', 'ms', 'prof', 'st', 'jr', 'sr', 'resp', 'cit', 'ca', 'est',
]);

const PARAGRAPH_BREAK = /\n[ \t]*\n\s*/g;
const BOUNDARY = /[.?!]["'”’)\]]*(?=\s+["'“‘(]?\p{Lu})/gu;

export function isSpace(ch: string | undefined): boolean {
    return ch !== undefined && /\s/.test(ch);
}

/**
 * Split text into sentence spans, in order. Spans cover every non-whitespace
 * character of the text exactly once.
 */
export function splitSentences(text: string): SentenceSpan[] {
    const sentences: SentenceSpan[] = [];
    let paragraph = 0;
    let paragraphStart = 0;

    const pushParagraph = (from: number, to: number) => {
        let sentenceStart = from;
        const segment = text.slice(from, to);

        for (const match of segment.matchAll(BOUNDARY)) {
            const punctuation = from + (match.index ?? 0);
            if (text[punctuation] === '.' && isAbbreviated(text, punctuation, from)) continue;

            pushSpan(sentences, text, sentenceStart, punctuation + match[0].length, paragraph);
            sentenceStart = punctuation + match[0].length;
        }
        pushSpan(sentences, text, sentenceStart, to, paragraph);
    };

    for (const brk of text.matchAll(PARAGRAPH_BREAK)) {
        const before = sentences.length;
        const breakStart = brk.index ?? 0;
        pushParagraph(paragraphStart, breakStart);
        if (sentences.length > before) paragraph++;
        paragraphStart = breakStart + brk[0].length;
    }
    pushParagraph(paragraphStart, text.length);

    return sentences;
}

function pushSpan(sentences: SentenceSpan[], text: string, from: number, to: number, paragraph: number): void {
    let start = from;
    let end = to;
    while (start < end && isSpace(text[start])) start++;
    while (end > start && isSpace(text[end - 1])) end--;
    if (end > start) sentences.push({ start, end, paragraph });
}

/**
 * Whether the period at `dot` belongs to an abbreviation ("et al.", "Fig.",
 * "e.g.") or an initial ("J. Smith").
 */
function isAbbreviated(text: string, dot: number, floor: number): boolean {
    let wordStart = dot;
    while (wordStart > floor && !isSpace(text[wordStart - 1]) && text[wordStart - 1] !== '(') {
        wordStart--;
    }

    const word = text.slice(wordStart, dot);
    if (word.length === 0) return false;
    if (/^\p{Lu}$/u.test(word)) return true;
    if (/^(?:\p{L}\.)+\p{L}$/u.test(word)) return true;

    return ABBREVIATIONS.has(word.toLowerCase());
}
