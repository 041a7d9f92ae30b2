import type { CitationMarker, ContextWindow, WindowConfig } from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { isSpace, splitSentences, type SentenceSpan } from './sentences.js';

/**
 * Builds context windows over one body text. Sentences are segmented once
 * and windows are memoized per marker span, so list markers that expand into
 * several citations share a single window.
 */
export class ContextWindowBuilder {
    private readonly config: WindowConfig;
    private readonly sentences: SentenceSpan[];
    private readonly cache = new Map<string, ContextWindow>();

    constructor(private readonly bodyText: string, config: Partial<WindowConfig> = {}) {
        this.config = { ...DEFAULT_CONFIG.window, ...config };
        if (this.config.maxChars < 1) {
            throw new RangeError(`maxChars must be positive, got ${this.config.maxChars}`);
        }
        this.sentences = splitSentences(bodyText);
    }

    get sentenceCount(): number {
        return this.sentences.length;
    }

    build(marker: CitationMarker): ContextWindow {
        const cacheKey = `${marker.startOffset}:${marker.endOffset}`;
        const cached = this.cache.get(cacheKey);
        if (cached) return cached;

        const window = this.compute(marker.startOffset, marker.endOffset);
        this.cache.set(cacheKey, window);
        return window;
    }

    private compute(markerStart: number, markerEnd: number): ContextWindow {
        const { sentenceRadius, maxChars, crossParagraphs } = this.config;
        const sentences = this.sentences;

        // Sentences the marker touches; more than one when a boundary fell inside it
        const first = sentences.findIndex((s) => s.end > markerStart);
        let last = first;
        while (last + 1 < sentences.length && (sentences[last + 1]?.start ?? Infinity) < markerEnd) {
            last++;
        }

        const firstSentence = sentences[first];
        const lastSentence = sentences[last];
        if (first < 0 || !firstSentence || !lastSentence) {
            return this.window(markerStart, markerEnd, markerStart, 1, false);
        }

        const paragraphFrom = firstSentence.paragraph;
        const paragraphTo = lastSentence.paragraph;

        let lo = first;
        while (lo > 0 && first - lo < sentenceRadius && (crossParagraphs || sentences[lo - 1]?.paragraph === paragraphFrom)) {
            lo--;
        }
        let hi = last;
        while (hi + 1 < sentences.length && hi - last < sentenceRadius && (crossParagraphs || sentences[hi + 1]?.paragraph === paragraphTo)) {
            hi++;
        }

        // Drop the outermost context sentence, from the side with more of them
        // (the following side on ties), until the window fits.
        let truncated = false;
        while (this.span(lo, hi) > maxChars && (lo < first || hi > last)) {
            const before = first - lo;
            const after = hi - last;
            if (after >= before && after > 0) {
                hi--;
            } else {
                lo++;
            }
            truncated = true;
        }

        const start = sentences[lo]?.start ?? markerStart;
        const end = sentences[hi]?.end ?? markerEnd;
        if (end - start <= maxChars) {
            return this.window(start, end, markerStart, hi - lo + 1, truncated);
        }

        return this.clip(firstSentence.start, lastSentence.end, markerStart, markerEnd, last - first + 1);
    }

    /**
     * The marker's own sentence is longer than maxChars: keep as many whole
     * words on each side of the marker as fit.
     */
    private clip(sentenceStart: number, sentenceEnd: number, markerStart: number, markerEnd: number, sentenceCount: number): ContextWindow {
        const text = this.bodyText;
        const available = this.config.maxChars - (markerEnd - markerStart);
        if (available <= 0) {
            return this.window(markerStart, markerEnd, markerStart, sentenceCount, true);
        }

        const leftRoom = markerStart - sentenceStart;
        const rightRoom = sentenceEnd - markerEnd;
        let leftTake = Math.min(leftRoom, Math.floor(available / 2));
        const rightTake = Math.min(rightRoom, available - leftTake);
        leftTake = Math.min(leftRoom, available - rightTake);

        let start = markerStart - leftTake;
        let end = markerEnd + rightTake;

        if (start > sentenceStart && !isSpace(text[start - 1])) {
            while (start < markerStart && !isSpace(text[start])) start++;
        }
        while (start < markerStart && isSpace(text[start])) start++;

        if (end < sentenceEnd && !isSpace(text[end])) {
            while (end > markerEnd && !isSpace(text[end - 1])) end--;
        }
        while (end > markerEnd && isSpace(text[end - 1])) end--;

        return this.window(start, end, markerStart, sentenceCount, true);
    }

    private span(lo: number, hi: number): number {
        return (this.sentences[hi]?.end ?? 0) - (this.sentences[lo]?.start ?? 0);
    }

    private window(start: number, end: number, markerStart: number, sentenceCount: number, truncated: boolean): ContextWindow {
        return {
            text: this.bodyText.slice(start, end),
            sentenceCount,
            containsMarkerAt: markerStart - start,
            startOffset: start,
            endOffset: end,
            truncated,
        };
    }
}

/**
 * Build the context window for a single marker.
 */
export function buildWindow(
    marker: CitationMarker,
    bodyText: string,
    config: Partial<WindowConfig> = {}
): ContextWindow {
    return new ContextWindowBuilder(bodyText, config).build(marker);
}
