/**
 * Idea Schemas — The persisted unit of the asset pool.
 */
import { z } from "zod/v4";

export const Pathway = z.enum(["deploy-service", "consulting", "training-course", "custom-development"]);
export type Pathway = z.infer<typeof Pathway>;

export const IdeaStatus = z.enum(["proposed", "accepted", "executing", "monetized", "rejected"]);
export type IdeaStatus = z.infer<typeof IdeaStatus>;

/** A non-negative `{ min, max }` estimate with `min <= max`. */
export const EstimateRange = z
    .object({
        min: z.number().nonnegative(),
        max: z.number().nonnegative(),
    })
    .refine((r) => r.min <= r.max, { message: "min must not exceed max" });
export type EstimateRange = z.infer<typeof EstimateRange>;

/** Money actually earned from an idea, recorded once it is monetized. */
export const RevenueRecord = z.object({
    amount: z.number().nonnegative(),
    /** Channel the money came from, e.g. "marketplace" or "direct invoice". */
    source: z.string().trim().min(1),
    notes: z.string().optional(),
    recorded_at: z.iso.datetime(),
});
export type RevenueRecord = z.infer<typeof RevenueRecord>;

/** Revenue as supplied by a caller; `recorded_at` defaults to now. */
export const RevenueInput = RevenueRecord.extend({
    recorded_at: z.iso.datetime().optional(),
});
export type RevenueInput = z.input<typeof RevenueInput>;

export const Idea = z.object({
    /** Deterministic hash of (owner/name, pathway); the dedup key. */
    idea_id: z.uuid(),
    title: z.string().min(1),
    description: z.string(),
    target_users: z.array(z.string()),
    /** Interest tags derived from the source repository (topics, language). */
    tags: z.array(z.string()),
    pathway: Pathway,
    launch_cost: EstimateRange,
    monthly_revenue: EstimateRange,
    time_to_launch_days: EstimateRange,
    currency: z.string().min(1),
    potential_score: z.number().min(0).max(100),
    source_full_name: z.string().min(1),
    source_url: z.string(),
    created_at: z.iso.datetime(),
    status: IdeaStatus,
    realized_revenue: z.array(RevenueRecord).default([]),
});
export type Idea = z.infer<typeof Idea>;

/** One entry of the pool's audit trail. */
export const StatusChange = z.object({
    idea_id: z.string(),
    from_status: IdeaStatus.nullable(),
    to_status: IdeaStatus,
    note: z.string().nullable(),
    changed_at: z.iso.datetime(),
});
export type StatusChange = z.infer<typeof StatusChange>;

export const ExecutionStepStatus = z.enum(["pending", "in_progress", "completed", "failed"]);
export type ExecutionStepStatus = z.infer<typeof ExecutionStepStatus>;

/**
 * One entry of an idea's execution journal: a step of the launch plan with
 * its outcome, or a free-text log line.
 */
export const ExecutionEntry = z.object({
    idea_id: z.string(),
    kind: z.enum(["step", "log"]),
    text: z.string().trim().min(1),
    /** Outcome of a step; null for log lines. */
    step_status: ExecutionStepStatus.nullable(),
    recorded_at: z.iso.datetime(),
});
export type ExecutionEntry = z.infer<typeof ExecutionEntry>;
