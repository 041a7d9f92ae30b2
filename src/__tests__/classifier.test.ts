import { describe, it, expect, vi } from 'vitest';
import { CitationClassifierAdapter } from '../classifier/adapter.js';
import { LlmClassifier } from '../classifier/llm-classifier.js';
import { parseClassifierReply, parsePurpose, parseStance, unknownAnalysis } from '../classifier/response.js';
import { buildClassificationPrompt, referenceHint } from '../classifier/prompt.js';
import { buildReferenceIndex } from '../references/reference-index.js';
import { HttpError } from '../utils/http-client.js';
import { ClassifierError, ClassifierUnavailableError } from '../utils/errors.js';
import {
    CitationPurpose,
    CitationStance,
    UNKNOWN,
    type Classifier,
    type ClassifierRequest,
    type ContextWindow,
    type LlmCompletionParams,
    type LlmProvider,
} from '../types/index.js';

const WINDOW: ContextWindow = {
    text: 'We follow the approach of (Smith, 2020) closely.',
    sentenceCount: 1,
    containsMarkerAt: 26,
    startOffset: 0,
    endOffset: 48,
    truncated: false,
};

const SMITH = buildReferenceIndex('Smith, J. (2020). Deep citation analysis. Journal of Things.').entries[0] ?? null;

function stubClassifier(reply: unknown): Classifier & { requests: ClassifierRequest[] } {
    const requests: ClassifierRequest[] = [];
    return {
        id: 'stub',
        requests,
        classify: async (request) => {
            requests.push(request);
            return reply;
        },
    };
}

describe('parseClassifierReply', () => {
    it('should accept a complete reply', () => {
        expect(parseClassifierReply({
            contribution: 'Provides the indexing method',
            purpose: 'METHODOLOGY',
            stance: 'EXTEND',
            confidence: 0.9,
        })).toEqual({
            contribution: 'Provides the indexing method',
            purpose: CitationPurpose.METHODOLOGY,
            stance: CitationStance.EXTEND,
            confidence: 0.9,
            status: 'OK',
            unknownFields: [],
            error: null,
        });
    });

    it('should default missing and unrecognized fields and mark the reply partial', () => {
        const analysis = parseClassifierReply({ purpose: 'astrology', stance: 'neutral' });
        expect(analysis.status).toBe('PARTIAL');
        expect(analysis.purpose).toBe(UNKNOWN);
        expect(analysis.stance).toBe(CitationStance.NEUTRAL);
        expect(analysis.confidence).toBe(0);
        expect(analysis.unknownFields).toEqual(['contribution', 'purpose', 'confidence']);
    });

    it('should read JSON text wrapped in a code fence', () => {
        const analysis = parseClassifierReply(
            '```json\n{"contribution": "Background", "purpose": "background", "stance": "neutral", "confidence": "0.5"}\n```'
        );
        expect(analysis.purpose).toBe(CitationPurpose.BACKGROUND);
        expect(analysis.confidence).toBe(0.5);
        expect(analysis.status).toBe('OK');
    });

    it('should clamp confidence and accept percentages', () => {
        expect(parseClassifierReply({ confidence: 7 }).confidence).toBe(1);
        expect(parseClassifierReply({ confidence: -1 }).confidence).toBe(0);
        expect(parseClassifierReply({ confidence: '85%' }).confidence).toBeCloseTo(0.85);
    });

    it('should reject replies without a usable analysis', () => {
        expect(() => parseClassifierReply(null)).toThrow('Classifier returned an empty reply');
        expect(() => parseClassifierReply('   ')).toThrow('Classifier returned an empty reply');
        expect(() => parseClassifierReply('no json here')).toThrow('Classifier reply is not valid JSON');
        expect(() => parseClassifierReply('[1, 2]')).toThrow('Classifier reply is not a JSON object');
        expect(() => parseClassifierReply({ error: 'model overloaded' })).toThrow(
            'Classifier reported a failure: model overloaded'
        );
        expect(() => parseClassifierReply({ answer: 'yes' })).toThrow('Classifier reply has none of the analysis fields');
        expect(() => parseClassifierReply({ answer: 'yes' })).toThrow(ClassifierError);
    });

    it('should ignore a false or null error field', () => {
        expect(parseClassifierReply({ error: null, purpose: 'OTHER' }).purpose).toBe(CitationPurpose.OTHER);
        expect(parseClassifierReply({ error: false, stance: 'agree' }).stance).toBe(CitationStance.AGREE);
    });

    it('should build the analysis for unfinished classifications', () => {
        expect(unknownAnalysis('CANCELLED', 'Run timed out')).toEqual({
            contribution: UNKNOWN,
            purpose: UNKNOWN,
            stance: UNKNOWN,
            confidence: 0,
            status: 'CANCELLED',
            unknownFields: ['contribution', 'purpose', 'stance', 'confidence'],
            error: 'Run timed out',
        });
    });
});

describe('Enum aliases', () => {
    it('should normalize free-form purpose labels', () => {
        expect(parsePurpose('supporting evidence')).toBe(CitationPurpose.SUPPORTING_EVIDENCE);
        expect(parsePurpose('Contrasting view')).toBe(CitationPurpose.CONTRAST);
        expect(parsePurpose('methods')).toBe(CitationPurpose.METHODOLOGY);
        expect(parsePurpose(3)).toBe(UNKNOWN);
    });

    it('should normalize free-form stance labels', () => {
        expect(parseStance('Builds-on')).toBe(CitationStance.EXTEND);
        expect(parseStance('disagrees')).toBe(CitationStance.CRITIQUE);
        expect(parseStance('  agreement ')).toBe(CitationStance.AGREE);
    });
});

describe('Prompt', () => {
    it('should describe a resolved reference', () => {
        expect(referenceHint(SMITH)).toBe('Smith, J. (2020). Deep citation analysis');
        expect(referenceHint(null)).toBeNull();
    });

    it('should include the context, title and vocabulary', () => {
        const prompt = buildClassificationPrompt({ context: 'Some context.', referenceHint: null, paperTitle: 'My Paper' });
        expect(prompt).toContain('Citing paper: My Paper\n');
        expect(prompt).toContain('Cited work: unknown (not found in the bibliography)\n');
        expect(prompt).toContain('\n"Some context."\n');
        expect(prompt).toContain('SUPPORTING_EVIDENCE, CONTRAST, BACKGROUND, METHODOLOGY or OTHER');
    });
});

describe('CitationClassifierAdapter', () => {
    it('should send the window text, reference hint and paper title', async () => {
        const classifier = stubClassifier({ contribution: 'x', purpose: 'OTHER', stance: 'NEUTRAL', confidence: 1 });
        const adapter = new CitationClassifierAdapter(classifier);

        const analysis = await adapter.classify(WINDOW, SMITH, 'Host paper');

        expect(analysis.status).toBe('OK');
        expect(classifier.requests).toEqual([{
            context: 'We follow the approach of (Smith, 2020) closely.',
            referenceHint: 'Smith, J. (2020). Deep citation analysis',
            paperTitle: 'Host paper',
        }]);
        expect(adapter.classifierId).toBe('stub');
    });

    it('should pass a null hint for unresolved citations', async () => {
        const classifier = stubClassifier({ purpose: 'BACKGROUND' });
        const adapter = new CitationClassifierAdapter(classifier);

        const analysis = await adapter.classify(WINDOW, null, '');

        expect(analysis.status).toBe('PARTIAL');
        expect(classifier.requests[0]?.referenceHint).toBeNull();
    });

    it('should surface malformed replies as ClassifierError', async () => {
        const adapter = new CitationClassifierAdapter(stubClassifier('not json'));
        await expect(adapter.classify(WINDOW, SMITH, '')).rejects.toThrow(ClassifierError);
    });

    it('should wrap transport failures as ClassifierUnavailableError', async () => {
        const adapter = new CitationClassifierAdapter({
            id: 'broken',
            classify: async () => {
                throw new Error('socket hang up');
            },
        });

        await expect(adapter.classify(WINDOW, SMITH, '')).rejects.toThrow(
            new ClassifierUnavailableError('Classifier broken failed: socket hang up')
        );
    });
});

describe('LlmClassifier', () => {
    function fakeProvider(complete: LlmProvider['complete']): LlmProvider {
        return {
            name: 'fake',
            complete,
            isAvailable: async () => true,
        };
    }

    it('should request JSON mode and return the parsed reply', async () => {
        const complete = vi.fn(async (_prompt: string, _params?: LlmCompletionParams) => ({
            text: '{"purpose":"OTHER"}',
            parsed: { purpose: 'OTHER' },
            usage: { promptTokens: 1, completionTokens: 1, totalTokens: 2 },
            model: 'm',
            provider: 'fake',
        }));
        const classifier = new LlmClassifier(fakeProvider(complete), { model: 'm', temperature: 0.1, maxTokens: 50 });

        const reply = await classifier.classify({ context: 'c', referenceHint: null, paperTitle: '' });

        expect(classifier.id).toBe('fake:m');
        expect(reply).toEqual({ purpose: 'OTHER' });
        expect(complete.mock.calls[0]?.[1]).toMatchObject({
            model: 'm',
            temperature: 0.1,
            maxTokens: 50,
            jsonMode: true,
            systemPrompt: 'You are a research assistant that analyzes academic citations.',
        });
    });

    it('should fall back to the reply text when nothing was parsed', async () => {
        const classifier = new LlmClassifier(
            fakeProvider(async () => ({
                text: 'plain text',
                usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
                model: 'm',
                provider: 'fake',
            })),
            { model: 'm', temperature: 0, maxTokens: 10 }
        );

        await expect(classifier.classify({ context: 'c', referenceHint: null, paperTitle: '' })).resolves.toBe('plain text');
    });

    it('should map HTTP errors to ClassifierUnavailableError', async () => {
        const classifier = new LlmClassifier(
            fakeProvider(async () => {
                throw new HttpError('HTTP 503: Service Unavailable', 503, true);
            }),
            { model: 'm', temperature: 0, maxTokens: 10 }
        );

        const error = await classifier.classify({ context: 'c', referenceHint: null, paperTitle: '' }).catch((e: unknown) => e);
        expect(error).toBeInstanceOf(ClassifierUnavailableError);
        expect(error).toMatchObject({ message: 'fake request failed: HTTP 503: Service Unavailable', status: 503 });
    });
});
