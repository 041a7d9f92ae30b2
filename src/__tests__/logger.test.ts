import { describe, it, expect, afterEach } from 'vitest';
import { initLogger, getLogger } from '../utils/logger.js';
import { ClassifierUnavailableError } from '../utils/errors.js';

describe('Logger', () => {
    afterEach(() => {
        initLogger({ level: 'error', jsonLogs: true });
    });

    function capture(level: 'info' | 'error') {
        const lines: string[] = [];
        initLogger({ level, jsonLogs: true, destination: { write: (line: string) => void lines.push(line) } });
        return lines;
    }

    it('should serialize errors logged under the error key', () => {
        const lines = capture('info');

        getLogger().error(
            { error: new ClassifierUnavailableError('ollama down', undefined, { provider: 'ollama' }) },
            'Analysis failed'
        );

        expect(lines).toHaveLength(1);
        const record: unknown = JSON.parse(lines[0] ?? '{}');
        expect(record).toMatchObject({
            level: 50,
            msg: 'Analysis failed',
            error: { type: 'ClassifierUnavailableError', message: 'ollama down', details: { provider: 'ollama' } },
        });
    });

    it('should drop records below the configured level', () => {
        const lines = capture('error');

        getLogger().warn('ignored');
        getLogger().error('kept');

        expect(lines.map((line) => JSON.parse(line).msg)).toEqual(['kept']);
    });
});
