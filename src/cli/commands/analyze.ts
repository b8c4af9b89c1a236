import * as p from "@clack/prompts";
import chalk from "chalk";
import ora from "ora";
import { analyzeRepository, createComponents } from "../../orchestrator.js";
import { AssetPool } from "../../memory/pool.js";
import { GitHubSource } from "../../sources/github.js";
import { DuplicateIdeaError } from "../../errors/index.js";
import { loadCliContext, loadOptionalPreferences, parseRepositoryRef, reportFailure } from "../context.js";
import type { PathOptions } from "../context.js";
import { formatRankedIdea, formatScore } from "../report.js";

export interface AnalyzeOptions extends PathOptions {
    save?: boolean;
}

export async function analyzeCommand(ref: string, options: AnalyzeOptions) {
    p.intro(chalk.bgBlue.black(" trendmint - Analyze Repository "));

    const target = parseRepositoryRef(ref);
    if (!target) {
        p.log.error(chalk.red(`Not a GitHub repository: ${ref}`));
        p.log.message(`Expected ${chalk.cyan("https://github.com/owner/name")} or ${chalk.cyan("owner/name")}.`);
        process.exitCode = 1;
        return;
    }

    let pool: AssetPool | undefined;
    const spinner = ora(`Fetching ${target.owner}/${target.name}...`);

    try {
        const context = loadCliContext(options);
        const preferences = loadOptionalPreferences(context.preferencesPath);
        const source = new GitHubSource({ config: context.config.source, token: process.env.GITHUB_TOKEN });

        spinner.start();
        const input = await source.fetchRepository(target.owner, target.name);
        spinner.stop();

        const analysis = analyzeRepository(input, createComponents(context.config), preferences);
        p.log.message(formatScore(analysis.record, analysis.score));

        if (analysis.ideas.length === 0) {
            p.outro("No monetization signals found for this repository.");
            return;
        }

        const ranked = analysis.ranked ?? analysis.ideas.map((idea) => ({ idea, affinity: 0 }));
        if (analysis.ranked && ranked.length < analysis.ideas.length) {
            p.log.info(`${analysis.ideas.length - ranked.length} ideas do not fit your budget or hours`);
        }
        ranked.forEach((entry, index) => {
            p.log.message(formatRankedIdea(entry, index + 1));
        });

        if (options.save) {
            pool = AssetPool.open(context.dbPath);
            let saved = 0;
            for (const idea of analysis.ideas) {
                try {
                    pool.insert(idea);
                    saved++;
                } catch (error) {
                    if (!(error instanceof DuplicateIdeaError)) throw error;
                    p.log.warn(`Already in the pool: ${idea.title}`);
                }
            }
            p.log.success(`Saved ${saved} ideas to ${chalk.cyan(context.dbPath)}`);
        }

        p.outro(`${analysis.ideas.length} ideas generated.`);
    } catch (error) {
        if (spinner.isSpinning) spinner.fail(chalk.red("Analysis failed."));
        reportFailure(error);
    } finally {
        pool?.close();
    }
}
