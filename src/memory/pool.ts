/**
 * Asset Pool — The system's memory across runs.
 *
 * Stores every generated idea, keeps at most one live (non-rejected) idea per
 * `idea_id`, records each status change for audit and tracks the revenue
 * monetized ideas bring in, along with the steps and log lines recorded while
 * an idea is worked on. Ideas are never deleted; rejecting one frees its id
 * for a later run.
 *
 * Every mutation is a single `BEGIN IMMEDIATE` transaction, so two processes
 * sharing one pool file cannot both insert the same id.
 */
import Database from "better-sqlite3";
import { assertTransition } from "../core/lifecycle.js";
import {
    DuplicateIdeaError,
    InvalidExecutionError,
    InvalidRevenueError,
    NotFoundError,
} from "../errors/index.js";
import {
    ExecutionEntry as ExecutionEntrySchema,
    ExecutionStepStatus as ExecutionStepStatusSchema,
    Idea as IdeaSchema,
    IdeaStatus as IdeaStatusSchema,
    RevenueInput,
} from "../schemas/idea.js";
import type {
    ExecutionEntry,
    ExecutionStepStatus,
    Idea,
    IdeaStatus,
    Pathway,
    RevenueRecord,
    StatusChange,
} from "../schemas/idea.js";
import type { RevenueInput as RevenueInputType } from "../schemas/idea.js";
import { SqliteDatabase } from "./sqlite.js";
import type { IdeaRow } from "./sqlite.js";

export interface IdeaFilter {
    statuses?: readonly IdeaStatus[];
    pathways?: readonly Pathway[];
}

export interface StatusUpdateOptions {
    /** Revenue realized by the change; only accepted when moving to `monetized`. */
    realizedRevenue?: RevenueInputType;
    /** Free-text reason stored with the audit entry. */
    note?: string;
}

export interface RevenueStats {
    total: number;
    count: number;
    average: number;
    by_source: Record<string, number>;
}

export interface ExecutionStats {
    /** Moves into `executing`, ever. */
    started: number;
    in_progress: number;
    /** Executions that ended `monetized`. */
    succeeded: number;
    /** Executions that ended `rejected`. */
    failed: number;
    steps: number;
    logs: number;
}

export interface PoolOverview {
    ideas: Record<IdeaStatus, number> & { total: number };
    /** monetized / (monetized + rejected); 0 before anything finished. */
    success_rate: number;
    revenue: RevenueStats;
    executions: ExecutionStats;
}

export interface AssetPoolOptions {
    /** Clock for audit timestamps. Default: `() => new Date()` */
    now?: () => Date;
}

const EXECUTION_STATUSES: readonly IdeaStatus[] = ["accepted", "executing"];

/** True for a UNIQUE index violation only. */
export function isUniqueViolation(error: unknown): boolean {
    return error instanceof Database.SqliteError && error.code === "SQLITE_CONSTRAINT_UNIQUE";
}

export class AssetPool {
    private readonly db: SqliteDatabase;
    private readonly now: () => Date;

    constructor(db: SqliteDatabase, options: AssetPoolOptions = {}) {
        this.db = db;
        this.now = options.now ?? (() => new Date());
    }

    /** Open (and migrate) a pool file. ":memory:" gives a throwaway pool. */
    static open(dbPath: string, options: AssetPoolOptions = {}): AssetPool {
        return new AssetPool(new SqliteDatabase(dbPath), options);
    }

    /** True when a live (non-rejected) idea with this id is stored. */
    contains(ideaId: string): boolean {
        return this.db.hasLiveIdea(ideaId);
    }

    /**
     * Store `idea` with status `proposed`.
     * @throws DuplicateIdeaError when a live idea with the same id exists
     */
    insert(idea: Idea): Idea {
        const stored: Idea = { ...IdeaSchema.parse(idea), status: "proposed", realized_revenue: [] };
        const timestamp = this.timestamp();

        try {
            this.db.immediate(() => {
                if (this.db.hasLiveIdea(stored.idea_id)) {
                    throw new DuplicateIdeaError(stored.idea_id);
                }
                const rowId = this.db.insertIdeaRow(stored, timestamp);
                this.db.insertStatusChange({
                    rowId,
                    ideaId: stored.idea_id,
                    fromStatus: null,
                    toStatus: "proposed",
                    changedAt: timestamp,
                });
            });
        } catch (error) {
            // A writer on another connection can still win the race for the
            // partial unique index.
            if (isUniqueViolation(error)) throw new DuplicateIdeaError(stored.idea_id);
            throw error;
        }
        return stored;
    }

    /**
     * Move an idea along the lifecycle graph.
     * @throws NotFoundError when no idea with this id was ever stored
     * @throws InvalidTransitionError when the edge is not allowed
     * @throws InvalidRevenueError when revenue accompanies a non-monetizing change
     */
    updateStatus(ideaId: string, newStatus: IdeaStatus, options: StatusUpdateOptions = {}): Idea {
        const status = IdeaStatusSchema.parse(newStatus);
        const revenue = options.realizedRevenue ? this.toRevenueRecord(options.realizedRevenue) : undefined;
        const timestamp = this.timestamp();

        return this.db.immediate(() => {
            const row = this.db.getCurrentIdeaRow(ideaId);
            if (!row) throw new NotFoundError(ideaId);

            assertTransition(ideaId, row.status, status);
            if (revenue && status !== "monetized") {
                throw new InvalidRevenueError(ideaId, status);
            }

            this.db.updateIdeaStatus(row.row_id, status, timestamp);
            this.db.insertStatusChange({
                rowId: row.row_id,
                ideaId,
                fromStatus: row.status,
                toStatus: status,
                note: options.note,
                changedAt: timestamp,
            });
            if (revenue) {
                this.db.insertRevenueRecord(row.row_id, ideaId, revenue);
            }
            return this.toIdea({ ...row, status, updated_at: timestamp });
        });
    }

    /**
     * Append revenue to an already monetized idea.
     * @throws NotFoundError when no idea with this id was ever stored
     * @throws InvalidRevenueError when the idea is not monetized
     */
    recordRevenue(ideaId: string, input: RevenueInputType): Idea {
        const revenue = this.toRevenueRecord(input);
        return this.db.immediate(() => {
            const row = this.db.getCurrentIdeaRow(ideaId);
            if (!row) throw new NotFoundError(ideaId);
            if (row.status !== "monetized") throw new InvalidRevenueError(ideaId, row.status);

            this.db.insertRevenueRecord(row.row_id, ideaId, revenue);
            return this.toIdea(row);
        });
    }

    /**
     * Record a step of an accepted or executing idea's launch plan.
     * @throws NotFoundError when no idea with this id was ever stored
     * @throws InvalidExecutionError when the idea is not being worked on
     */
    addExecutionStep(ideaId: string, step: string, status: ExecutionStepStatus = "completed"): ExecutionEntry {
        return this.appendExecution(ideaId, "step", step, ExecutionStepStatusSchema.parse(status));
    }

    /**
     * Record a free-text log line against an accepted or executing idea.
     * @throws NotFoundError when no idea with this id was ever stored
     * @throws InvalidExecutionError when the idea is not being worked on
     */
    addExecutionLog(ideaId: string, text: string): ExecutionEntry {
        return this.appendExecution(ideaId, "log", text, null);
    }

    /** Steps and log lines for an id, across all of its stored versions, in order. */
    executionLog(ideaId: string): ExecutionEntry[] {
        return this.db.listExecutionEntries(ideaId);
    }

    /** The live idea for this id, else its most recently rejected version. */
    get(ideaId: string): Idea | null {
        const row = this.db.getCurrentIdeaRow(ideaId);
        return row ? this.toIdea(row) : null;
    }

    /** Ideas matching every given filter, oldest first. Omitted filters match all. */
    list(filter: IdeaFilter = {}): Idea[] {
        return this.db.listIdeaRows(filter).map((row) => this.toIdea(row));
    }

    /** Audit trail for an id, across all of its stored versions, in order. */
    history(ideaId: string): StatusChange[] {
        return this.db.listStatusChanges(ideaId);
    }

    revenueStats(ideaId?: string): RevenueStats {
        const records = this.db.listAllRevenue(ideaId);
        const total = records.reduce((sum, r) => sum + r.amount, 0);
        const bySource: Record<string, number> = {};
        for (const record of records) {
            bySource[record.source] = (bySource[record.source] ?? 0) + record.amount;
        }
        return {
            total,
            count: records.length,
            average: records.length > 0 ? total / records.length : 0,
            by_source: bySource,
        };
    }

    overview(): PoolOverview {
        const counts = this.db.countIdeasByStatus();
        const ideas = {
            total: 0,
            proposed: counts.get("proposed") ?? 0,
            accepted: counts.get("accepted") ?? 0,
            executing: counts.get("executing") ?? 0,
            monetized: counts.get("monetized") ?? 0,
            rejected: counts.get("rejected") ?? 0,
        };
        ideas.total = ideas.proposed + ideas.accepted + ideas.executing + ideas.monetized + ideas.rejected;
        const finished = ideas.monetized + ideas.rejected;

        return {
            ideas,
            success_rate: finished > 0 ? ideas.monetized / finished : 0,
            revenue: this.revenueStats(),
            executions: {
                ...this.db.countExecutionOutcomes(),
                in_progress: ideas.executing,
                ...this.db.countExecutionEntries(),
            },
        };
    }

    close(): void {
        this.db.close();
    }

    private timestamp(): string {
        return this.now().toISOString();
    }

    private appendExecution(
        ideaId: string,
        kind: ExecutionEntry["kind"],
        text: string,
        stepStatus: ExecutionStepStatus | null,
    ): ExecutionEntry {
        const entry = ExecutionEntrySchema.parse({
            idea_id: ideaId,
            kind,
            text,
            step_status: stepStatus,
            recorded_at: this.timestamp(),
        });
        return this.db.immediate(() => {
            const row = this.db.getCurrentIdeaRow(ideaId);
            if (!row) throw new NotFoundError(ideaId);
            if (!EXECUTION_STATUSES.includes(row.status)) throw new InvalidExecutionError(ideaId, row.status);

            this.db.insertExecutionEntry(row.row_id, entry);
            return entry;
        });
    }

    private toRevenueRecord(input: RevenueInputType): RevenueRecord {
        const parsed = RevenueInput.parse(input);
        return { ...parsed, recorded_at: parsed.recorded_at ?? this.timestamp() };
    }

    private toIdea(row: IdeaRow): Idea {
        return IdeaSchema.parse({
            idea_id: row.idea_id,
            title: row.title,
            description: row.description,
            target_users: row.target_users,
            tags: row.tags,
            pathway: row.pathway,
            launch_cost: { min: row.launch_cost_min, max: row.launch_cost_max },
            monthly_revenue: { min: row.revenue_min, max: row.revenue_max },
            time_to_launch_days: { min: row.time_min_days, max: row.time_max_days },
            currency: row.currency,
            potential_score: row.potential_score,
            source_full_name: row.source_full_name,
            source_url: row.source_url,
            created_at: row.created_at,
            status: row.status,
            realized_revenue: this.db.listRevenueRecords(row.row_id),
        });
    }
}
