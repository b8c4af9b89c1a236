/**
 * Report — Plain-text renderings of pipeline and pool results for the
 * terminal. Pure functions; colors come from chalk and disappear when chalk
 * is disabled.
 */
import chalk from "chalk";
import type { RankedIdea } from "../core/matcher.js";
import type { EstimateRange, ExecutionEntry, Idea, IdeaStatus, StatusChange } from "../schemas/idea.js";
import type { RepositoryRecord } from "../schemas/repository.js";
import type { ScoreResult, Potential } from "../schemas/score.js";
import type { PoolOverview, RevenueStats } from "../memory/pool.js";

const POTENTIAL_COLORS: Record<Potential, (text: string) => string> = {
    high: chalk.green,
    medium: chalk.yellow,
    low: chalk.gray,
};

const STATUS_ORDER: readonly IdeaStatus[] = ["proposed", "accepted", "executing", "monetized", "rejected"];

function plural(count: number, noun: string): string {
    return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

export function formatMoney(amount: number, currency: string): string {
    try {
        return new Intl.NumberFormat("en-US", {
            style: "currency",
            currency,
            minimumFractionDigits: 0,
            maximumFractionDigits: 0,
        }).format(amount);
    } catch (error) {
        // Unknown currency codes fall back to a bare number
        if (!(error instanceof RangeError)) throw error;
        return `${Math.round(amount)} ${currency}`;
    }
}

export function formatRange(range: EstimateRange, currency: string): string {
    return `${formatMoney(range.min, currency)} - ${formatMoney(range.max, currency)}`;
}

export function formatDays(range: EstimateRange): string {
    return range.min === range.max ? `${range.min} days` : `${range.min}-${range.max} days`;
}

/** Multi-line entry for one ranked idea, numbered from 1. */
export function formatRankedIdea(ranked: RankedIdea, position: number): string {
    const { idea, affinity } = ranked;
    return [
        `${position}. ${chalk.bold(idea.title)} ${chalk.dim(`[${idea.pathway}]`)}`,
        `   ${idea.source_full_name} | score ${idea.potential_score} | affinity ${Math.round(affinity * 100)}%`,
        `   cost ${formatRange(idea.launch_cost, idea.currency)} | revenue ${formatRange(idea.monthly_revenue, idea.currency)}/month | launch ${formatDays(idea.time_to_launch_days)}`,
        chalk.dim(`   id ${idea.idea_id}`),
    ].join("\n");
}

export function formatScore(record: RepositoryRecord, score: ScoreResult): string {
    const color = POTENTIAL_COLORS[score.potential];
    const lines = [
        `${chalk.bold(record.full_name)}: ${color(`${score.score}/100 (${score.potential})`)}`,
        `category: ${score.category ?? "none"}`,
    ];
    for (const signal of score.signals) {
        lines.push(`  - ${signal}`);
    }
    return lines.join("\n");
}

/** One line per idea, for `pool list`. */
export function formatIdeaRow(idea: Idea): string {
    return `${idea.idea_id}  ${idea.status.padEnd(9)}  ${idea.pathway.padEnd(18)}  ${idea.title}`;
}

export function formatHistory(changes: readonly StatusChange[]): string {
    return changes
        .map((change) => {
            const line = `${change.changed_at}  ${change.from_status ?? "(new)"} -> ${change.to_status}`;
            return change.note ? `${line}  ${chalk.dim(change.note)}` : line;
        })
        .join("\n");
}

export function formatExecutionLog(entries: readonly ExecutionEntry[]): string {
    return entries
        .map((entry) =>
            entry.kind === "step"
                ? `${entry.recorded_at}  [${entry.step_status ?? "completed"}] ${entry.text}`
                : `${entry.recorded_at}  ${chalk.dim(entry.text)}`,
        )
        .join("\n");
}

export function formatRevenueStats(stats: RevenueStats, currency: string): string {
    const lines = [
        `total ${formatMoney(stats.total, currency)} over ${plural(stats.count, "record")}`,
        `average ${formatMoney(stats.average, currency)}`,
    ];
    for (const [source, amount] of Object.entries(stats.by_source).sort(([, a], [, b]) => b - a)) {
        lines.push(`  ${source}: ${formatMoney(amount, currency)}`);
    }
    return lines.join("\n");
}

export function formatOverview(overview: PoolOverview, currency: string): string {
    const lines = [`ideas: ${overview.ideas.total}`];
    for (const status of STATUS_ORDER) {
        lines.push(`  ${status.padEnd(9)} ${overview.ideas[status]}`);
    }
    lines.push(`success rate: ${(overview.success_rate * 100).toFixed(1)}%`);
    lines.push(formatRevenueStats(overview.revenue, currency));

    const executions = overview.executions;
    lines.push(
        `executions: ${executions.started} started, ${executions.in_progress} in progress, ` +
            `${executions.succeeded} succeeded, ${executions.failed} failed`,
    );
    lines.push(`  ${plural(executions.steps, "step")}, ${plural(executions.logs, "log line")}`);
    return lines.join("\n");
}
