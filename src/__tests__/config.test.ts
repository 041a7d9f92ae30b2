import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { mergeConfig, loadEnvVars, loadConfigFile } from '../utils/config.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { CiteLensError } from '../utils/errors.js';

describe('Configuration', () => {
    describe('DEFAULT_CONFIG', () => {
        it('should carry the documented defaults', () => {
            expect(DEFAULT_CONFIG.window).toEqual({ sentenceRadius: 1, maxChars: 800, crossParagraphs: false });
            expect(DEFAULT_CONFIG.classifier.concurrency).toBe(4);
            expect(DEFAULT_CONFIG.classifier.transportRetries).toBe(2);
            expect(DEFAULT_CONFIG.timeoutMs).toBe(300000);
            expect(DEFAULT_CONFIG.format).toBe('json');
        });
    });

    describe('mergeConfig', () => {
        it('should return the defaults without sources', () => {
            expect(mergeConfig()).toEqual(DEFAULT_CONFIG);
        });

        it('should let later sources win and deep-merge sections', () => {
            const config = mergeConfig(
                { format: 'csv', window: { maxChars: 400 }, classifier: { model: 'file-model', concurrency: 2 } },
                { classifier: { model: 'env-model' } },
                { window: { sentenceRadius: 0 }, classifier: { concurrency: 8 } }
            );

            expect(config.format).toBe('csv');
            expect(config.window).toEqual({ sentenceRadius: 0, maxChars: 400, crossParagraphs: false });
            expect(config.classifier).toMatchObject({ provider: 'openai', model: 'env-model', concurrency: 8 });
        });

        it('should ignore undefined values', () => {
            const config = mergeConfig(
                { timeoutMs: 1000, classifier: { provider: 'ollama' } },
                { timeoutMs: undefined, classifier: { provider: undefined } }
            );

            expect(config.timeoutMs).toBe(1000);
            expect(config.classifier.provider).toBe('ollama');
        });

        it('should not mutate the defaults', () => {
            mergeConfig({ window: { maxChars: 10 } });
            expect(DEFAULT_CONFIG.window.maxChars).toBe(800);
        });
    });

    describe('loadEnvVars', () => {
        it('should read citelens variables', () => {
            expect(loadEnvVars({
                CITELENS_PROVIDER: 'ollama',
                CITELENS_MODEL: 'llama3',
                CITELENS_CONCURRENCY: '3',
                CITELENS_TIMEOUT_MS: '0',
                CITELENS_LOG_LEVEL: 'debug',
                OLLAMA_BASE_URL: 'http://gpu-box:11434',
            })).toEqual({
                timeoutMs: 0,
                logLevel: 'debug',
                classifier: {
                    provider: 'ollama',
                    model: 'llama3',
                    concurrency: 3,
                    baseUrl: 'http://gpu-box:11434',
                },
            });
        });

        it('should apply OLLAMA_BASE_URL only to the ollama provider', () => {
            expect(loadEnvVars({ OLLAMA_BASE_URL: 'http://gpu-box:11434' })).toEqual({});
        });

        it('should ignore unrelated variables', () => {
            expect(loadEnvVars({ PATH: '/usr/bin', OPENAI_API_KEY: 'test-secret' })).toEqual({});
        });

        it('should reject invalid values', () => {
            expect(() => loadEnvVars({ CITELENS_CONCURRENCY: 'many' })).toThrow(CiteLensError);
            expect(() => loadEnvVars({ CITELENS_PROVIDER: 'gemini' })).toThrow(/^Invalid environment configuration: CITELENS_PROVIDER/);
        });
    });

    describe('loadConfigFile', () => {
        let tmpDir: string;

        beforeEach(() => {
            tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'citelens-config-'));
        });

        afterEach(() => {
            fs.rmSync(tmpDir, { recursive: true, force: true });
        });

        it('should load and validate citelens.config.json', async () => {
            fs.writeFileSync(
                path.join(tmpDir, 'citelens.config.json'),
                JSON.stringify({ format: 'markdown', window: { maxChars: 500 }, classifier: { provider: 'ollama' } })
            );

            await expect(loadConfigFile(tmpDir)).resolves.toEqual({
                format: 'markdown',
                window: { maxChars: 500 },
                classifier: { provider: 'ollama' },
            });
        });

        it('should reject unknown or invalid settings', async () => {
            const file = path.join(tmpDir, 'citelens.config.json');
            fs.writeFileSync(file, JSON.stringify({ window: { maxChars: -5 } }));

            await expect(loadConfigFile(tmpDir)).rejects.toThrow(`Invalid config file ${file}: window.maxChars`);
        });
    });
});
