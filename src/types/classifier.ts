/**
 * Request crossing the classifier boundary.
 */
export interface ClassifierRequest {
    /** Context window text */
    context: string;
    /** Resolved reference's authors/year/title, or null when unresolved */
    referenceHint: string | null;
    /** Host paper title (may be empty) */
    paperTitle: string;
}

/**
 * Black-box citation classifier. Implementations return the raw structured
 * reply (an object, or JSON text); the adapter validates its shape.
 */
export interface Classifier {
    /** Identifies the backing model, used for cache keys */
    readonly id: string;

    classify(request: ClassifierRequest, options?: { signal?: AbortSignal }): Promise<unknown>;
}
