import * as p from "@clack/prompts";
import chalk from "chalk";
import { z } from "zod/v4";
import { AssetPool } from "../../memory/pool.js";
import { ExecutionStepStatus, IdeaStatus, Pathway } from "../../schemas/idea.js";
import { loadCliContext, reportFailure } from "../context.js";
import type { CliContext, PathOptions } from "../context.js";
import {
    formatExecutionLog,
    formatHistory,
    formatIdeaRow,
    formatMoney,
    formatOverview,
    formatRevenueStats,
} from "../report.js";

export interface ListOptions extends PathOptions {
    status?: string[];
    pathway?: string[];
}

export interface StatusOptions extends PathOptions {
    note?: string;
    amount?: number;
    source?: string;
    notes?: string;
}

export interface RevenueOptions extends PathOptions {
    source: string;
    notes?: string;
}

export interface StepOptions extends PathOptions {
    status?: string;
}

/** Open the pool for one command and always close it again. */
async function withPool(options: PathOptions, fn: (pool: AssetPool, context: CliContext) => void | Promise<void>) {
    let pool: AssetPool | undefined;
    try {
        const context = loadCliContext(options);
        pool = AssetPool.open(context.dbPath);
        await fn(pool, context);
    } catch (error) {
        reportFailure(error);
    } finally {
        pool?.close();
    }
}

export async function poolListCommand(options: ListOptions) {
    await withPool(options, (pool) => {
        const ideas = pool.list({
            statuses: options.status ? z.array(IdeaStatus).parse(options.status) : undefined,
            pathways: options.pathway ? z.array(Pathway).parse(options.pathway) : undefined,
        });
        if (ideas.length === 0) {
            p.log.info("The pool has no matching ideas.");
            return;
        }
        p.log.message(ideas.map(formatIdeaRow).join("\n"));
        p.log.info(`${ideas.length} ideas`);
    });
}

export async function poolStatusCommand(ideaId: string, status: string, options: StatusOptions) {
    await withPool(options, (pool) => {
        const realizedRevenue =
            options.amount === undefined
                ? undefined
                : { amount: options.amount, source: options.source ?? "unspecified", notes: options.notes };
        const idea = pool.updateStatus(ideaId, IdeaStatus.parse(status), { realizedRevenue, note: options.note });
        p.log.success(`${chalk.bold(idea.title)} is now ${chalk.cyan(idea.status)}`);
    });
}

export async function poolRevenueCommand(ideaId: string, amount: number, options: RevenueOptions) {
    await withPool(options, (pool) => {
        const idea = pool.recordRevenue(ideaId, { amount, source: options.source, notes: options.notes });
        p.log.success(`Recorded ${formatMoney(amount, idea.currency)} for ${chalk.bold(idea.title)}`);
        p.log.message(formatRevenueStats(pool.revenueStats(ideaId), idea.currency));
    });
}

export async function poolStepCommand(ideaId: string, step: string, options: StepOptions) {
    await withPool(options, (pool) => {
        const status = ExecutionStepStatus.parse(options.status ?? "completed");
        const entry = pool.addExecutionStep(ideaId, step, status);
        p.log.success(`Step recorded: ${entry.text} ${chalk.cyan(`[${status}]`)}`);
    });
}

export async function poolLogCommand(ideaId: string, text: string, options: PathOptions) {
    await withPool(options, (pool) => {
        pool.addExecutionLog(ideaId, text);
        p.log.success(`Logged against ${ideaId}`);
    });
}

export async function poolHistoryCommand(ideaId: string, options: PathOptions) {
    await withPool(options, (pool) => {
        const changes = pool.history(ideaId);
        if (changes.length === 0) {
            p.log.info(`No history for ${ideaId}`);
            return;
        }
        p.log.message(formatHistory(changes));

        const entries = pool.executionLog(ideaId);
        if (entries.length > 0) {
            p.log.step("Execution");
            p.log.message(formatExecutionLog(entries));
        }
    });
}

export async function poolOverviewCommand(options: PathOptions) {
    await withPool(options, (pool, context) => {
        p.log.message(formatOverview(pool.overview(), context.config.generation.currency));
    });
}
