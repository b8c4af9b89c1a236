import * as p from "@clack/prompts";
import chalk from "chalk";
import ora from "ora";
import { createComponents, runPipeline } from "../../orchestrator.js";
import type { PipelineStage } from "../../orchestrator.js";
import { AssetPool } from "../../memory/pool.js";
import { GitHubSource } from "../../sources/github.js";
import { TrendingWindow } from "../../schemas/config.js";
import { describeError, loadCliContext, loadPreferences, reportFailure } from "../context.js";
import type { PathOptions } from "../context.js";
import { formatRankedIdea } from "../report.js";

export interface RunOptions extends PathOptions {
    window?: string;
    fetchLimit?: number;
    limit?: number;
    dryRun?: boolean;
    includeExisting?: boolean;
}

const STAGE_LABELS: Record<PipelineStage, string> = {
    fetch: "Fetching trending repositories...",
    score: "Scoring repositories...",
    generate: "Generating ideas...",
    dedupe: "Checking the asset pool...",
    match: "Matching your preferences...",
    done: "Done.",
};

export async function runCommand(options: RunOptions) {
    p.intro(chalk.bgMagenta.black(" trendmint - Run Pipeline "));

    let pool: AssetPool | undefined;
    const spinner = ora();

    try {
        const context = loadCliContext(options);
        const preferences = loadPreferences(context.preferencesPath);
        const window = TrendingWindow.parse(options.window ?? context.config.source.window);
        pool = AssetPool.open(context.dbPath);

        const source = new GitHubSource({
            config: context.config.source,
            token: process.env.GITHUB_TOKEN,
            onRetry: (error, attempt, delayMs) => {
                spinner.text = `Retry ${attempt} in ${delayMs}ms (${describeError(error)})`;
            },
        });

        p.log.step(`Pool: ${chalk.cyan(context.dbPath)}`);
        spinner.start(STAGE_LABELS.fetch);

        const invalidNames: string[] = [];
        const result = await runPipeline({
            ...createComponents(context.config),
            source,
            pool,
            preferences,
            window,
            fetchLimit: options.fetchLimit ?? context.config.source.limit,
            limit: options.limit,
            persist: !options.dryRun,
            includeExisting: options.includeExisting,
            onStageChange: (stage) => {
                spinner.text = STAGE_LABELS[stage];
            },
            onInvalidRecord: (error) => {
                invalidNames.push(error.issues.join(", "));
            },
        });

        spinner.succeed(
            chalk.green(
                options.dryRun
                    ? `Scored ${result.scored.length} repositories (dry run, nothing stored).`
                    : `Scored ${result.scored.length} repositories, stored ${result.inserted.length} new ideas.`,
            ),
        );

        if (result.invalid.length > 0) {
            p.log.warn(`Skipped ${result.invalid.length} malformed records`);
            for (const issue of invalidNames) {
                p.log.message(chalk.dim(`  ${issue}`));
            }
        }
        if (result.skipped.length > 0) {
            p.log.info(`${result.skipped.length} ideas were already in the pool`);
        }

        if (result.ranked.length === 0) {
            p.outro("No ideas match your preferences this time.");
            return;
        }

        result.ranked.forEach((ranked, index) => {
            p.log.message(formatRankedIdea(ranked, index + 1));
        });
        p.outro(`${result.ranked.length} ideas ranked for you.`);
    } catch (error) {
        if (spinner.isSpinning) spinner.fail(chalk.red("Pipeline failed."));
        reportFailure(error);
    } finally {
        pool?.close();
    }
}
