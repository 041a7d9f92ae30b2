/**
 * Parse completion text as JSON, or undefined when it is not JSON.
 */
export function parseJsonText(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}
