#!/usr/bin/env node
import { writeFileSync } from 'node:fs';
import { Command, InvalidArgumentError } from 'commander';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { loadDocument } from '../document/loader.js';
import { createLlmProvider, ensureProviderAvailable } from '../llm/index.js';
import { LlmClassifier } from '../classifier/llm-classifier.js';
import { runPipeline } from '../pipeline/orchestrator.js';
import { snapshotReport, summarizeReport } from '../pipeline/report.js';
import { ResponseCache, DEFAULT_CACHE_DIR, clearCache, directoryUsage } from '../cache/response-cache.js';
import { exportRun, renderReport, isReportFormat, FORMAT_EXTENSIONS, REPORT_FORMATS } from '../exporters/export.js';
import { ReportDatabase } from '../storage/database.js';
import type { LlmProviderName, LogLevel, ReportFormat } from '../types/index.js';

const VERSION = '1.0.0';

// ─── Argument parsers ─────────────────────────────────────

function parseCount(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new InvalidArgumentError('Expected a non-negative integer.');
    }
    return parsed;
}

function parsePositive(value: string): number {
    const parsed = parseCount(value);
    if (parsed === 0) throw new InvalidArgumentError('Expected a positive integer.');
    return parsed;
}

function parseFormat(value: string): ReportFormat {
    const format = value.toLowerCase();
    if (!isReportFormat(format)) {
        throw new InvalidArgumentError(`Valid formats: ${REPORT_FORMATS.join(', ')}.`);
    }
    return format;
}

function parseProvider(value: string): LlmProviderName {
    if (value !== 'openai' && value !== 'ollama') {
        throw new InvalidArgumentError('Valid providers: openai, ollama.');
    }
    return value;
}

function parseLogLevel(value: string): LogLevel {
    if (value !== 'error' && value !== 'warn' && value !== 'info' && value !== 'debug') {
        throw new InvalidArgumentError('Valid levels: debug, info, warn, error.');
    }
    return value;
}

const program = new Command();

program
    .name('citelens')
    .description('Extract in-text citations from a paper and analyze how each cited work is used.')
    .version(VERSION);

// ─── ANALYZE command ──────────────────────────────────────

interface AnalyzeOptions {
    input?: string;
    body?: string;
    bibliography?: string;
    title?: string;
    provider?: LlmProviderName;
    model?: string;
    baseUrl?: string;
    concurrency?: number;
    timeout?: number;
    sentenceRadius?: number;
    maxChars?: number;
    crossParagraphs?: boolean;
    format?: ReportFormat;
    report?: string;
    db?: string;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
    cache: boolean;
}

program
    .command('analyze')
    .description('Analyze the citations of one paper')
    .option('-i, --input <file>', 'Full text with a references section')
    .option('--body <file>', 'Body text (use with --bibliography)')
    .option('--bibliography <file>', 'Reference list text (use with --body)')
    .option('-t, --title <title>', 'Title of the citing paper')
    .option('--provider <name>', 'LLM provider: openai | ollama', parseProvider)
    .option('-m, --model <model>', 'Model name')
    .option('--base-url <url>', 'Provider base URL')
    .option('-c, --concurrency <n>', 'Concurrent classifier calls (default 4)', parsePositive)
    .option('--timeout <ms>', 'Whole-document timeout, 0 to disable (default 300000)', parseCount)
    .option('--sentence-radius <n>', 'Context sentences on each side of the marker (default 1)', parseCount)
    .option('--max-chars <n>', 'Maximum context window length (default 800)', parsePositive)
    .option('--cross-paragraphs', 'Let context windows cross paragraph breaks')
    .option('-f, --format <format>', 'Report format: json | csv | markdown (default json)', parseFormat)
    .option('-r, --report <file>', 'Write the report to a file instead of stdout')
    .option('--db <path>', 'Store the run in a SQLite database')
    .option('--log-level <level>', 'Log level: debug | info | warn | error', parseLogLevel)
    .option('--json-logs', 'Output JSON logs')
    .option('--no-cache', 'Disable response caching')
    .action(async (opts: AnalyzeOptions) => {
        const cliConfig: ConfigOverrides = {
            input: opts.input,
            body: opts.body,
            bibliography: opts.bibliography,
            title: opts.title,
            format: opts.format,
            report: opts.report,
            db: opts.db,
            timeoutMs: opts.timeout,
            logLevel: opts.logLevel,
            jsonLogs: opts.jsonLogs,
            noCache: opts.cache ? undefined : true,
            window: {
                sentenceRadius: opts.sentenceRadius,
                maxChars: opts.maxChars,
                crossParagraphs: opts.crossParagraphs,
            },
            classifier: {
                provider: opts.provider,
                model: opts.model,
                baseUrl: opts.baseUrl,
                concurrency: opts.concurrency,
            },
        };

        const controller = new AbortController();
        process.once('SIGINT', () => controller.abort());

        try {
            const config = await resolveConfig(cliConfig);
            initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
            const logger = getLogger();

            const document = loadDocument(config);
            const provider = createLlmProvider(config.classifier);
            await ensureProviderAvailable(provider);
            const classifier = new LlmClassifier(provider, {
                model: config.classifier.model,
                temperature: config.classifier.temperature,
                maxTokens: config.classifier.maxTokens,
            });
            const cache = config.noCache ? null : new ResponseCache({ cacheDir: config.cacheDir });

            logger.info({ title: document.title, provider: config.classifier.provider, model: config.classifier.model }, 'Starting analysis');

            const report = await runPipeline(document, { classifier, config, cache, signal: controller.signal });
            const snapshot = snapshotReport(report);
            const output = renderReport(snapshot, config.format);

            if (config.report) {
                writeFileSync(config.report, output, 'utf-8');
                logger.info({ report: config.report, format: config.format }, 'Report written');
            } else {
                process.stdout.write(output);
            }

            if (config.db) {
                const db = new ReportDatabase(config.db);
                try {
                    const runId = db.saveReport(snapshot, { version: VERSION, config });
                    logger.info({ db: config.db, runId }, 'Run stored');
                } finally {
                    db.close();
                }
            }

            logger.info({ summary: summarizeReport(report).byStatus }, 'Analysis complete');
            if (report.partial) {
                logger.warn({ cancelled: report.stats.cancelled }, 'Report is partial: classification stopped early');
                process.exitCode = 2;
            }
        } catch (error) {
            getLogger().error({ error }, 'Analysis failed');
            process.exit(1);
        }
    });

// ─── EXPORT command ───────────────────────────────────────

program
    .command('export')
    .description('Export a stored run to JSON, CSV, or Markdown')
    .requiredOption('-i, --input <dbPath>', 'Input database path')
    .requiredOption('-f, --format <format>', 'Export format: json | csv | markdown', parseFormat)
    .option('--run <id>', 'Run ID (latest by default)', parsePositive)
    .option('-o, --out <path>', 'Output file path')
    .action((opts: { input: string; format: ReportFormat; run?: number; out?: string }) => {
        const outputPath = opts.out ?? opts.input.replace(/\.db$/, '') + FORMAT_EXTENSIONS[opts.format];

        try {
            const runId = exportRun(opts.input, outputPath, opts.format, opts.run);
            console.log(`Exported run ${runId} to ${outputPath}`);
        } catch (error) {
            console.error('Export failed:', error instanceof Error ? error.message : error);
            process.exit(1);
        }
    });

// ─── INSPECT command ──────────────────────────────────────

program
    .command('inspect')
    .description('Show database statistics')
    .requiredOption('-i, --input <dbPath>', 'Input database path')
    .action((opts: { input: string }) => {
        try {
            const db = new ReportDatabase(opts.input);
            const stats = db.getStats();
            const runs = db.listRuns();
            db.close();

            console.log('\nCitation Database Statistics\n');
            console.log(`  Runs:       ${stats.runs}`);
            console.log(`  References: ${stats.references}`);
            console.log(`  Citations:  ${stats.citations}`);

            if (Object.keys(stats.citationsByStatus).length > 0) {
                console.log('\n  By status:');
                for (const [status, count] of Object.entries(stats.citationsByStatus)) {
                    console.log(`    ${status}: ${count}`);
                }
            }

            if (Object.keys(stats.citationsByPurpose).length > 0) {
                console.log('\n  By purpose:');
                for (const [purpose, count] of Object.entries(stats.citationsByPurpose)) {
                    console.log(`    ${purpose}: ${count}`);
                }
            }

            if (runs.length > 0) {
                console.log('\n  Runs:');
                for (const run of runs) {
                    const title = run.paper_title || '(untitled)';
                    console.log(`    #${run.run_id} ${run.created_at} ${title}${run.partial ? ' [partial]' : ''}`);
                }
            }

            console.log('');
        } catch (error) {
            console.error('Inspect failed:', error instanceof Error ? error.message : error);
            process.exit(1);
        }
    });

// ─── CACHE command ────────────────────────────────────────

program
    .command('cache')
    .description('Manage the response cache')
    .argument('<action>', 'Action: clear | stats')
    .option('--dir <path>', 'Cache directory', DEFAULT_CACHE_DIR)
    .action((action: string, opts: { dir: string }) => {
        switch (action) {
            case 'clear':
                console.log(clearCache(opts.dir) ? 'Cache cleared.' : 'No cache to clear.');
                break;
            case 'stats': {
                const usage = directoryUsage(opts.dir);
                if (usage.entries === 0) {
                    console.log('No cache found.');
                } else {
                    console.log(`Cache: ${usage.entries} entries, ${(usage.bytes / 1024).toFixed(1)} KB`);
                }
                break;
            }
            default:
                console.error(`Unknown action: ${action}. Valid: clear, stats`);
                process.exit(1);
        }
    });

await program.parseAsync();
