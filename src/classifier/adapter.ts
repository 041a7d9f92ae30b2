import type {
    CitationAnalysis,
    Classifier,
    ClassifierRequest,
    ContextWindow,
    ReferenceEntry,
} from '../types/index.js';
import { CiteLensError, ClassifierUnavailableError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { referenceHint } from './prompt.js';
import { parseClassifierReply } from './response.js';

/**
 * Boundary between the pipeline and the black-box classifier.
 *
 * One call per classification: no caching and no retries at this level
 * (the HTTP transport under an LLM classifier has its own retry policy).
 */
export class CitationClassifierAdapter {
    constructor(private readonly classifier: Classifier) {}

    get classifierId(): string {
        return this.classifier.id;
    }

    /**
     * Request sent for a window/reference pair. Exposed so callers can key
     * caches on exactly what the classifier sees.
     */
    buildRequest(window: ContextWindow, reference: ReferenceEntry | null, paperTitle: string): ClassifierRequest {
        return {
            context: window.text,
            referenceHint: referenceHint(reference),
            paperTitle,
        };
    }

    /**
     * Classify one citation occurrence.
     *
     * @throws ClassifierError when the reply is empty, malformed or an explicit failure
     * @throws ClassifierUnavailableError when the classifier cannot be reached
     */
    async classify(
        window: ContextWindow,
        reference: ReferenceEntry | null,
        paperTitle: string,
        signal?: AbortSignal
    ): Promise<CitationAnalysis> {
        const request = this.buildRequest(window, reference, paperTitle);

        let reply: unknown;
        try {
            reply = await this.classifier.classify(request, { signal });
        } catch (error) {
            if (error instanceof CiteLensError) throw error;
            throw new ClassifierUnavailableError(
                `Classifier ${this.classifier.id} failed: ${error instanceof Error ? error.message : String(error)}`
            );
        }

        const analysis = parseClassifierReply(reply);
        if (analysis.status === 'PARTIAL') {
            getLogger().debug(
                { classifier: this.classifier.id, unknownFields: analysis.unknownFields, reference: reference?.key ?? null },
                'Classifier reply was partial'
            );
        }
        return analysis;
    }
}
