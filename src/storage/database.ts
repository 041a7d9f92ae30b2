import Database from 'better-sqlite3';
import type {
    ReportSnapshot,
    ReportStats,
    RunRecord,
    SnapshotCitation,
    SnapshotReference,
} from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * SQLite schema migration v1.
 */
const MIGRATION_V1 = `
-- Runs: one analyzed document each
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL,
  citelens_version TEXT NOT NULL,
  paper_title TEXT NOT NULL DEFAULT '',
  config_json TEXT NOT NULL DEFAULT '{}',
  stats_json TEXT NOT NULL DEFAULT '{}',
  partial INTEGER NOT NULL DEFAULT 0
);

-- Bibliography entries parsed for a run
CREATE TABLE IF NOT EXISTS reference_entries (
  run_id INTEGER NOT NULL REFERENCES runs(run_id) ON DELETE CASCADE,
  ref_key TEXT NOT NULL,
  position INTEGER NOT NULL,
  number INTEGER,
  authors_json TEXT NOT NULL DEFAULT '[]',
  year INTEGER,
  year_suffix TEXT,
  title TEXT NOT NULL DEFAULT '',
  raw_text TEXT NOT NULL,
  PRIMARY KEY (run_id, ref_key)
);

-- Analyzed citation occurrences, in report order
CREATE TABLE IF NOT EXISTS citations (
  citation_id INTEGER PRIMARY KEY,
  run_id INTEGER NOT NULL REFERENCES runs(run_id) ON DELETE CASCADE,
  ordinal INTEGER NOT NULL,
  bucket TEXT NOT NULL,
  candidate_key TEXT NOT NULL,
  marker_text TEXT NOT NULL,
  style TEXT NOT NULL,
  start_offset INTEGER NOT NULL,
  end_offset INTEGER NOT NULL,
  resolution TEXT NOT NULL,
  ambiguity TEXT,
  context_text TEXT NOT NULL,
  window_start INTEGER NOT NULL,
  window_end INTEGER NOT NULL,
  truncated INTEGER NOT NULL DEFAULT 0,
  contribution TEXT NOT NULL,
  purpose TEXT NOT NULL,
  stance TEXT NOT NULL,
  confidence REAL NOT NULL DEFAULT 0,
  status TEXT NOT NULL,
  unknown_fields_json TEXT NOT NULL DEFAULT '[]',
  error TEXT
);

CREATE INDEX IF NOT EXISTS idx_citations_run ON citations(run_id, ordinal);
CREATE INDEX IF NOT EXISTS idx_citations_bucket ON citations(run_id, bucket);
`;

interface ReferenceRow {
    ref_key: string;
    number: number | null;
    authors_json: string;
    year: number | null;
    year_suffix: string | null;
    title: string;
    raw_text: string;
}

interface CitationRow extends Omit<SnapshotCitation, 'truncated' | 'unknown_fields'> {
    truncated: number;
    unknown_fields_json: string;
}

/**
 * Citation report database wrapper around better-sqlite3.
 * Handles schema migration, WAL mode, foreign keys, and run persistence.
 */
export class ReportDatabase {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        // Set pragmas
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        // Run migrations
        this.migrate();

        getLogger().debug({ dbPath }, 'Database initialized');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const currentVersion = this.db.pragma('user_version', { simple: true }) as number;

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().info('Database migrated to v1');
        }
    }

    // ─── Runs ─────────────────────────────────────────────────

    /**
     * Store a report snapshot as a new run. Returns the run ID.
     */
    saveReport(snapshot: ReportSnapshot, meta: { version: string; config?: unknown }): number {
        const runStmt = this.db.prepare(`
      INSERT INTO runs (created_at, citelens_version, paper_title, config_json, stats_json, partial)
      VALUES (@created_at, @citelens_version, @paper_title, @config_json, @stats_json, @partial)
    `);

        const referenceStmt = this.db.prepare(`
      INSERT INTO reference_entries (run_id, ref_key, position, number, authors_json, year, year_suffix, title, raw_text)
      VALUES (@run_id, @ref_key, @position, @number, @authors_json, @year, @year_suffix, @title, @raw_text)
    `);

        const citationStmt = this.db.prepare(`
      INSERT INTO citations (run_id, ordinal, bucket, candidate_key, marker_text, style, start_offset, end_offset,
        resolution, ambiguity, context_text, window_start, window_end, truncated,
        contribution, purpose, stance, confidence, status, unknown_fields_json, error)
      VALUES (@run_id, @ordinal, @bucket, @candidate_key, @marker_text, @style, @start_offset, @end_offset,
        @resolution, @ambiguity, @context_text, @window_start, @window_end, @truncated,
        @contribution, @purpose, @stance, @confidence, @status, @unknown_fields_json, @error)
    `);

        const insertAll = this.db.transaction((): number => {
            const run: Omit<RunRecord, 'run_id'> = {
                created_at: snapshot.generated_at,
                citelens_version: meta.version,
                paper_title: snapshot.paper_title,
                config_json: JSON.stringify(meta.config ?? {}),
                stats_json: JSON.stringify(snapshot.stats),
                partial: snapshot.partial ? 1 : 0,
            };
            const runId = Number(runStmt.run(run).lastInsertRowid);

            snapshot.references.forEach((reference, position) => {
                referenceStmt.run({
                    run_id: runId,
                    ref_key: reference.key,
                    position,
                    number: reference.number,
                    authors_json: JSON.stringify(reference.authors),
                    year: reference.year,
                    year_suffix: reference.year_suffix,
                    title: reference.title,
                    raw_text: reference.raw_text,
                });
            });

            snapshot.citations.forEach((citation, ordinal) => {
                const { unknown_fields, truncated, ...columns } = citation;
                citationStmt.run({
                    ...columns,
                    run_id: runId,
                    ordinal,
                    truncated: truncated ? 1 : 0,
                    unknown_fields_json: JSON.stringify(unknown_fields),
                });
            });

            return runId;
        });

        const runId = insertAll();
        getLogger().debug({ runId, citations: snapshot.citations.length }, 'Report saved');
        return runId;
    }

    listRuns(): RunRecord[] {
        return this.db.prepare('SELECT * FROM runs ORDER BY run_id').all() as RunRecord[];
    }

    getRun(runId: number): RunRecord | undefined {
        return this.db.prepare('SELECT * FROM runs WHERE run_id = ?').get(runId) as RunRecord | undefined;
    }

    latestRunId(): number | undefined {
        const row = this.db.prepare('SELECT MAX(run_id) as run_id FROM runs').get() as { run_id: number | null };
        return row.run_id ?? undefined;
    }

    /**
     * Rebuild the snapshot stored for a run.
     */
    loadSnapshot(runId: number): ReportSnapshot | undefined {
        const run = this.getRun(runId);
        if (!run) return undefined;

        const referenceRows = this.db.prepare(`
      SELECT ref_key, number, authors_json, year, year_suffix, title, raw_text
      FROM reference_entries WHERE run_id = ? ORDER BY position
    `).all(runId) as ReferenceRow[];

        const citationRows = this.db.prepare(`
      SELECT bucket, candidate_key, marker_text, style, start_offset, end_offset, resolution, ambiguity,
        context_text, window_start, window_end, truncated, contribution, purpose, stance, confidence,
        status, unknown_fields_json, error
      FROM citations WHERE run_id = ? ORDER BY ordinal
    `).all(runId) as CitationRow[];

        const references: SnapshotReference[] = referenceRows.map((row) => ({
            key: row.ref_key,
            number: row.number,
            authors: parseStringArray(row.authors_json),
            year: row.year,
            year_suffix: row.year_suffix,
            title: row.title,
            raw_text: row.raw_text,
        }));

        const citations: SnapshotCitation[] = citationRows.map(({ truncated, unknown_fields_json, ...columns }) => ({
            ...columns,
            truncated: truncated === 1,
            unknown_fields: parseStringArray(unknown_fields_json),
        }));

        return {
            paper_title: run.paper_title,
            generated_at: run.created_at,
            partial: run.partial === 1,
            stats: JSON.parse(run.stats_json) as ReportStats,
            references,
            citations,
        };
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): {
        runs: number;
        references: number;
        citations: number;
        citationsByStatus: Record<string, number>;
        citationsByPurpose: Record<string, number>;
    } {
        const count = (sql: string) => (this.db.prepare(sql).get() as { count: number }).count;

        return {
            runs: count('SELECT COUNT(*) as count FROM runs'),
            references: count('SELECT COUNT(*) as count FROM reference_entries'),
            citations: count('SELECT COUNT(*) as count FROM citations'),
            citationsByStatus: this.groupCount('status'),
            citationsByPurpose: this.groupCount('purpose'),
        };
    }

    private groupCount(column: 'status' | 'purpose'): Record<string, number> {
        const rows = this.db.prepare(`SELECT ${column} as value, COUNT(*) as count FROM citations GROUP BY ${column} ORDER BY ${column}`)
            .all() as Array<{ value: string; count: number }>;
        const counts: Record<string, number> = {};
        for (const row of rows) {
            counts[row.value] = row.count;
        }
        return counts;
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        getLogger().debug('Database closed');
    }
}

function parseStringArray(json: string): string[] {
    const value: unknown = JSON.parse(json);
    return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}
