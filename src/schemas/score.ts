/**
 * Score Schemas — Output of the Scorer.
 */
import { z } from "zod/v4";

export const Category = z.enum(["tooling", "training-content", "consulting", "managed-service"]);
export type Category = z.infer<typeof Category>;

/**
 * Tie-break order when two signal groups are equally strong.
 * Earlier entries win.
 */
export const CATEGORY_PRIORITY: readonly Category[] = [
    "tooling",
    "managed-service",
    "consulting",
    "training-content",
];

export const SignalName = z.enum(["velocity", "magnitude", "topics", "language", "keywords"]);
export type SignalName = z.infer<typeof SignalName>;

export const Potential = z.enum(["high", "medium", "low"]);
export type Potential = z.infer<typeof Potential>;

const Unit = z.number().min(0).max(1);

/** Each signal after clamping, kept for explainability. */
export const SignalBreakdown = z.object({
    velocity: Unit,
    magnitude: Unit,
    topics: Unit,
    language: Unit,
    keywords: Unit,
});
export type SignalBreakdown = z.infer<typeof SignalBreakdown>;

export const ScoreResult = z.object({
    score: z.number().min(0).max(100),
    /** null when no signal group fired; such records produce no ideas. */
    category: Category.nullable(),
    potential: Potential,
    signals: z.array(z.string()),
    breakdown: SignalBreakdown,
});
export type ScoreResult = z.infer<typeof ScoreResult>;
