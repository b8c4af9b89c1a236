/**
 * SQLite Database — Durable storage for the asset pool.
 *
 * Uses better-sqlite3 for zero-config, embedded, synchronous SQLite.
 * Manages schema migrations and the pool tables: ideas, their status audit
 * trail, realized revenue and the execution journal. Rows are decoded
 * through zod schemas on the way out.
 */
import { mkdirSync } from "fs";
import path from "path";
import Database from "better-sqlite3";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod/v4";
import type { ExecutionEntry, Idea, IdeaStatus, Pathway, RevenueRecord, StatusChange } from "../schemas/idea.js";
import {
    ExecutionEntry as ExecutionEntrySchema,
    IdeaStatus as IdeaStatusSchema,
    Pathway as PathwaySchema,
} from "../schemas/idea.js";

/** Schema migration definition. */
export interface Migration {
    version: number;
    description: string;
    up: string;
}

const INITIAL_SCHEMA = `
-- Ideas: one row per stored idea; rejected rows stay for the audit trail
CREATE TABLE IF NOT EXISTS ideas (
  row_id TEXT PRIMARY KEY,
  idea_id TEXT NOT NULL,
  pathway TEXT NOT NULL,
  status TEXT NOT NULL DEFAULT 'proposed',
  title TEXT NOT NULL,
  description TEXT NOT NULL,
  target_users TEXT NOT NULL DEFAULT '[]',
  tags TEXT NOT NULL DEFAULT '[]',
  launch_cost_min REAL NOT NULL,
  launch_cost_max REAL NOT NULL,
  revenue_min REAL NOT NULL,
  revenue_max REAL NOT NULL,
  time_min_days REAL NOT NULL,
  time_max_days REAL NOT NULL,
  currency TEXT NOT NULL,
  potential_score REAL NOT NULL,
  source_full_name TEXT NOT NULL,
  source_url TEXT NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

-- IdeaStatusChanges: append-only audit trail
CREATE TABLE IF NOT EXISTS idea_status_changes (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  row_id TEXT NOT NULL,
  idea_id TEXT NOT NULL,
  from_status TEXT,
  to_status TEXT NOT NULL,
  note TEXT,
  changed_at TEXT NOT NULL,
  FOREIGN KEY (row_id) REFERENCES ideas(row_id)
);

-- RevenueRecords: money actually earned from monetized ideas
CREATE TABLE IF NOT EXISTS revenue_records (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  row_id TEXT NOT NULL,
  idea_id TEXT NOT NULL,
  amount REAL NOT NULL,
  source TEXT NOT NULL,
  notes TEXT,
  recorded_at TEXT NOT NULL,
  FOREIGN KEY (row_id) REFERENCES ideas(row_id)
);

-- At most one live (non-rejected) row per idea_id
CREATE UNIQUE INDEX IF NOT EXISTS idx_ideas_live ON ideas(idea_id) WHERE status != 'rejected';
CREATE INDEX IF NOT EXISTS idx_ideas_idea_id ON ideas(idea_id);
CREATE INDEX IF NOT EXISTS idx_ideas_status ON ideas(status);
CREATE INDEX IF NOT EXISTS idx_ideas_pathway ON ideas(pathway);
CREATE INDEX IF NOT EXISTS idx_status_changes_idea ON idea_status_changes(idea_id, seq);
CREATE INDEX IF NOT EXISTS idx_revenue_row ON revenue_records(row_id, seq);
`;

const EXECUTION_ENTRIES = `
-- ExecutionEntries: steps and log lines recorded while an idea is worked on
CREATE TABLE IF NOT EXISTS execution_entries (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  row_id TEXT NOT NULL,
  idea_id TEXT NOT NULL,
  kind TEXT NOT NULL CHECK (kind IN ('step', 'log')),
  text TEXT NOT NULL,
  step_status TEXT,
  recorded_at TEXT NOT NULL,
  FOREIGN KEY (row_id) REFERENCES ideas(row_id)
);

CREATE INDEX IF NOT EXISTS idx_execution_entries_idea ON execution_entries(idea_id, seq);
`;

/** Forward-only migrations. */
const MIGRATIONS: Migration[] = [
    { version: 1, description: "Initial schema", up: INITIAL_SCHEMA },
    { version: 2, description: "Execution entries", up: EXECUTION_ENTRIES },
];

const JsonStringArray = z
    .string()
    .transform((value, ctx): unknown => {
        try {
            return JSON.parse(value);
        } catch {
            ctx.addIssue({ code: "custom", message: "expected JSON" });
            return z.NEVER;
        }
    })
    .pipe(z.array(z.string()));

/** A row of the `ideas` table. */
export const IdeaRow = z.object({
    row_id: z.string(),
    idea_id: z.string(),
    pathway: PathwaySchema,
    status: IdeaStatusSchema,
    title: z.string(),
    description: z.string(),
    target_users: JsonStringArray,
    tags: JsonStringArray,
    launch_cost_min: z.number(),
    launch_cost_max: z.number(),
    revenue_min: z.number(),
    revenue_max: z.number(),
    time_min_days: z.number(),
    time_max_days: z.number(),
    currency: z.string(),
    potential_score: z.number(),
    source_full_name: z.string(),
    source_url: z.string(),
    created_at: z.string(),
    updated_at: z.string(),
});
export type IdeaRow = z.infer<typeof IdeaRow>;

const StatusChangeRow = z.object({
    idea_id: z.string(),
    from_status: IdeaStatusSchema.nullable(),
    to_status: IdeaStatusSchema,
    note: z.string().nullable(),
    changed_at: z.string(),
});

const RevenueRow = z.object({
    amount: z.number(),
    source: z.string(),
    notes: z.string().nullable(),
    recorded_at: z.string(),
});

function toRevenueRecord(row: z.infer<typeof RevenueRow>): RevenueRecord {
    return {
        amount: row.amount,
        source: row.source,
        ...(row.notes === null ? {} : { notes: row.notes }),
        recorded_at: row.recorded_at,
    };
}

const StatusCountRow = z.object({ status: IdeaStatusSchema, n: z.number() });
const KindCountRow = z.object({ kind: z.enum(["step", "log"]), n: z.number() });
const ExecutionOutcomeRow = z.object({
    started: z.number().nullable(),
    succeeded: z.number().nullable(),
    failed: z.number().nullable(),
});
const VersionRow = z.object({ v: z.number().nullable() });

export interface IdeaRowFilter {
    statuses?: readonly IdeaStatus[];
    pathways?: readonly Pathway[];
}

function placeholders(count: number): string {
    return Array.from({ length: count }, () => "?").join(", ");
}

export class SqliteDatabase {
    private db: Database.Database;

    /**
     * @param dbPath file path, or ":memory:" for an in-process database
     * @param busyTimeoutMs how long a writer waits for another connection's lock
     */
    constructor(dbPath: string = ":memory:", busyTimeoutMs: number = 5000) {
        if (dbPath !== ":memory:") {
            mkdirSync(path.dirname(dbPath), { recursive: true });
        }
        this.db = new Database(dbPath);
        this.db.pragma("journal_mode = WAL");
        this.db.pragma("foreign_keys = ON");
        this.db.pragma(`busy_timeout = ${Math.max(0, Math.floor(busyTimeoutMs))}`);
        this.runMigrations();
    }

    /** Run pending migrations, forward-only, with version tracking. */
    private runMigrations(): void {
        this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_versions (
        version INTEGER PRIMARY KEY,
        applied_at TEXT NOT NULL DEFAULT (datetime('now')),
        description TEXT NOT NULL
      );
    `);

        const current = VersionRow.parse(this.db.prepare("SELECT MAX(version) as v FROM schema_versions").get());
        const version = current.v ?? 0;

        for (const migration of MIGRATIONS) {
            if (migration.version > version) {
                this.immediate(() => {
                    this.db.exec(migration.up);
                    this.db
                        .prepare("INSERT OR IGNORE INTO schema_versions (version, description) VALUES (?, ?)")
                        .run(migration.version, migration.description);
                });
            }
        }
    }

    /**
     * Run `fn` inside a `BEGIN IMMEDIATE` transaction: the write lock is taken
     * before `fn` reads, so a check-then-write inside it is exclusive across
     * every connection to the same file.
     */
    immediate<T>(fn: () => T): T {
        return this.db.transaction(fn).immediate();
    }

    // --- Insert methods ---

    insertIdeaRow(idea: Idea, updatedAt: string): string {
        const rowId = uuidv4();
        this.db
            .prepare(
                `INSERT INTO ideas (row_id, idea_id, pathway, status, title, description, target_users, tags,
           launch_cost_min, launch_cost_max, revenue_min, revenue_max, time_min_days, time_max_days,
           currency, potential_score, source_full_name, source_url, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
            )
            .run(
                rowId,
                idea.idea_id,
                idea.pathway,
                idea.status,
                idea.title,
                idea.description,
                JSON.stringify(idea.target_users),
                JSON.stringify(idea.tags),
                idea.launch_cost.min,
                idea.launch_cost.max,
                idea.monthly_revenue.min,
                idea.monthly_revenue.max,
                idea.time_to_launch_days.min,
                idea.time_to_launch_days.max,
                idea.currency,
                idea.potential_score,
                idea.source_full_name,
                idea.source_url,
                idea.created_at,
                updatedAt,
            );
        return rowId;
    }

    insertStatusChange(params: {
        rowId: string;
        ideaId: string;
        fromStatus: IdeaStatus | null;
        toStatus: IdeaStatus;
        note?: string;
        changedAt: string;
    }): void {
        this.db
            .prepare(
                `INSERT INTO idea_status_changes (row_id, idea_id, from_status, to_status, note, changed_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
            )
            .run(params.rowId, params.ideaId, params.fromStatus, params.toStatus, params.note ?? null, params.changedAt);
    }

    insertRevenueRecord(rowId: string, ideaId: string, record: RevenueRecord): void {
        this.db
            .prepare(
                `INSERT INTO revenue_records (row_id, idea_id, amount, source, notes, recorded_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
            )
            .run(rowId, ideaId, record.amount, record.source, record.notes ?? null, record.recorded_at);
    }

    insertExecutionEntry(rowId: string, entry: ExecutionEntry): void {
        this.db
            .prepare(
                `INSERT INTO execution_entries (row_id, idea_id, kind, text, step_status, recorded_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
            )
            .run(rowId, entry.idea_id, entry.kind, entry.text, entry.step_status, entry.recorded_at);
    }

    updateIdeaStatus(rowId: string, status: IdeaStatus, updatedAt: string): void {
        this.db.prepare("UPDATE ideas SET status = ?, updated_at = ? WHERE row_id = ?").run(status, updatedAt, rowId);
    }

    // --- Query methods ---

    /** The live (non-rejected) row for `ideaId`, if any. */
    getLiveIdeaRow(ideaId: string): IdeaRow | undefined {
        const row = this.db
            .prepare("SELECT * FROM ideas WHERE idea_id = ? AND status != 'rejected'")
            .get(ideaId);
        return row === undefined ? undefined : IdeaRow.parse(row);
    }

    /** The live row for `ideaId`, else its most recently rejected row. */
    getCurrentIdeaRow(ideaId: string): IdeaRow | undefined {
        const row = this.db
            .prepare(
                `SELECT * FROM ideas WHERE idea_id = ?
         ORDER BY CASE WHEN status = 'rejected' THEN 1 ELSE 0 END, updated_at DESC, rowid DESC
         LIMIT 1`,
            )
            .get(ideaId);
        return row === undefined ? undefined : IdeaRow.parse(row);
    }

    hasLiveIdea(ideaId: string): boolean {
        return (
            this.db.prepare("SELECT 1 FROM ideas WHERE idea_id = ? AND status != 'rejected' LIMIT 1").get(ideaId) !==
            undefined
        );
    }

    listIdeaRows(filter: IdeaRowFilter = {}): IdeaRow[] {
        const clauses: string[] = [];
        const params: string[] = [];
        if (filter.statuses) {
            if (filter.statuses.length === 0) return [];
            clauses.push(`status IN (${placeholders(filter.statuses.length)})`);
            params.push(...filter.statuses);
        }
        if (filter.pathways) {
            if (filter.pathways.length === 0) return [];
            clauses.push(`pathway IN (${placeholders(filter.pathways.length)})`);
            params.push(...filter.pathways);
        }
        const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
        return this.db
            .prepare(`SELECT * FROM ideas ${where} ORDER BY created_at ASC, idea_id ASC, rowid ASC`)
            .all(...params)
            .map((row) => IdeaRow.parse(row));
    }

    listStatusChanges(ideaId: string): StatusChange[] {
        return this.db
            .prepare(
                "SELECT idea_id, from_status, to_status, note, changed_at FROM idea_status_changes WHERE idea_id = ? ORDER BY seq ASC",
            )
            .all(ideaId)
            .map((row) => StatusChangeRow.parse(row));
    }

    listRevenueRecords(rowId: string): RevenueRecord[] {
        return this.db
            .prepare("SELECT amount, source, notes, recorded_at FROM revenue_records WHERE row_id = ? ORDER BY seq ASC")
            .all(rowId)
            .map((row) => toRevenueRecord(RevenueRow.parse(row)));
    }

    /** Revenue across every row, or every row of one `ideaId`. */
    listAllRevenue(ideaId?: string): RevenueRecord[] {
        const rows =
            ideaId === undefined
                ? this.db.prepare("SELECT amount, source, notes, recorded_at FROM revenue_records ORDER BY seq ASC").all()
                : this.db
                      .prepare(
                          "SELECT amount, source, notes, recorded_at FROM revenue_records WHERE idea_id = ? ORDER BY seq ASC",
                      )
                      .all(ideaId);
        return rows.map((row) => toRevenueRecord(RevenueRow.parse(row)));
    }

    countIdeasByStatus(): Map<IdeaStatus, number> {
        const counts = new Map<IdeaStatus, number>();
        for (const row of this.db.prepare("SELECT status, COUNT(*) as n FROM ideas GROUP BY status").all()) {
            const parsed = StatusCountRow.parse(row);
            counts.set(parsed.status, parsed.n);
        }
        return counts;
    }

    /** Execution entries for every stored version of `ideaId`, in order. */
    listExecutionEntries(ideaId: string): ExecutionEntry[] {
        return this.db
            .prepare(
                "SELECT idea_id, kind, text, step_status, recorded_at FROM execution_entries WHERE idea_id = ? ORDER BY seq ASC",
            )
            .all(ideaId)
            .map((row) => ExecutionEntrySchema.parse(row));
    }

    countExecutionEntries(): { steps: number; logs: number } {
        const counts = { steps: 0, logs: 0 };
        for (const row of this.db.prepare("SELECT kind, COUNT(*) as n FROM execution_entries GROUP BY kind").all()) {
            const parsed = KindCountRow.parse(row);
            if (parsed.kind === "step") counts.steps = parsed.n;
            else counts.logs = parsed.n;
        }
        return counts;
    }

    /**
     * Executions read off the audit trail: moves into `executing`, and the
     * moves out of it to `monetized` or `rejected`.
     */
    countExecutionOutcomes(): { started: number; succeeded: number; failed: number } {
        const row = ExecutionOutcomeRow.parse(
            this.db
                .prepare(
                    `SELECT
           SUM(to_status = 'executing') as started,
           SUM(from_status = 'executing' AND to_status = 'monetized') as succeeded,
           SUM(from_status = 'executing' AND to_status = 'rejected') as failed
         FROM idea_status_changes`,
                )
                .get(),
        );
        return { started: row.started ?? 0, succeeded: row.succeeded ?? 0, failed: row.failed ?? 0 };
    }

    /** Close the database connection. */
    close(): void {
        this.db.close();
    }

    /** Expose raw db for advanced queries in tests. */
    get raw(): Database.Database {
        return this.db;
    }
}
