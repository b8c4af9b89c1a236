#!/usr/bin/env node

import dotenv from "dotenv";

// Silence dotenv 17+ console output
process.env.DOTENV_CONFIG_SILENT = "true";
dotenv.config();

import { Command, Option } from "commander";
import {
    initCommand,
    runCommand,
    analyzeCommand,
    poolListCommand,
    poolStatusCommand,
    poolRevenueCommand,
    poolStepCommand,
    poolLogCommand,
    poolHistoryCommand,
    poolOverviewCommand,
} from "./commands/index.js";
import { parseAmount, parsePositiveInt } from "./context.js";

const program = new Command();

program
    .name("trendmint")
    .description("Turn trending GitHub repositories into ranked monetization ideas")
    .version("0.1.0")
    .option("-c, --config <path>", "Configuration file (default: ./trendmint.config.json)")
    .option("-p, --preferences <path>", "Preferences file (default: ./preferences.json)")
    .option("--db <path>", "Asset pool database (default: ~/.trendmint/pool.db)");

program
    .command("init")
    .description("Create a configuration and preferences file in the current directory")
    .option("-y, --yes", "Skip prompts and write the defaults")
    .action(initCommand);

program
    .command("run")
    .description("Fetch trending repositories, generate ideas and rank them for you")
    .addOption(new Option("-w, --window <window>", "Trending window").choices(["daily", "weekly", "monthly"]))
    .option("--fetch-limit <number>", "Repositories to fetch", parsePositiveInt)
    .option("-l, --limit <number>", "Show at most this many ideas", parsePositiveInt)
    .option("--dry-run", "Do not write new ideas to the pool")
    .option("--include-existing", "Also rank ideas the pool already holds")
    .action((options, command: Command) => runCommand({ ...command.optsWithGlobals(), ...options }));

program
    .command("analyze")
    .description("Score one repository and show the ideas it yields")
    .argument("<url>", "GitHub URL or owner/name")
    .option("-s, --save", "Store the generated ideas in the pool")
    .action((url: string, options, command: Command) => analyzeCommand(url, { ...command.optsWithGlobals(), ...options }));

const pool = program.command("pool").description("Inspect and update the asset pool");

pool
    .command("list")
    .description("List stored ideas")
    .option("--status <statuses...>", "Only these statuses")
    .option("--pathway <pathways...>", "Only these pathways")
    .action((options, command: Command) => poolListCommand({ ...command.optsWithGlobals(), ...options }));

pool
    .command("status")
    .description("Move an idea to a new status")
    .argument("<id>", "Idea id")
    .argument("<status>", "proposed | accepted | executing | monetized | rejected")
    .option("--note <text>", "Reason stored with the change")
    .option("--amount <amount>", "Revenue realized by this change (monetized only)", parseAmount)
    .option("--source <source>", "Where the revenue came from")
    .option("--notes <text>", "Notes for the revenue record")
    .action((id: string, status: string, options, command: Command) =>
        poolStatusCommand(id, status, { ...command.optsWithGlobals(), ...options }),
    );

pool
    .command("revenue")
    .description("Record revenue for a monetized idea")
    .argument("<id>", "Idea id")
    .argument("<amount>", "Amount earned", parseAmount)
    .requiredOption("--source <source>", "Where the revenue came from")
    .option("--notes <text>", "Notes for the revenue record")
    .action((id: string, amount: number, options, command: Command) =>
        poolRevenueCommand(id, amount, { ...command.optsWithGlobals(), ...options }),
    );

pool
    .command("step")
    .description("Record a step of an accepted or executing idea")
    .argument("<id>", "Idea id")
    .argument("<step>", "What was done")
    .option("--status <status>", "pending | in_progress | completed | failed", "completed")
    .action((id: string, step: string, options, command: Command) =>
        poolStepCommand(id, step, { ...command.optsWithGlobals(), ...options }),
    );

pool
    .command("log")
    .description("Add a log line to an accepted or executing idea")
    .argument("<id>", "Idea id")
    .argument("<text>", "Log text")
    .action((id: string, text: string, _options, command: Command) => poolLogCommand(id, text, command.optsWithGlobals()));

pool
    .command("history")
    .description("Show the status history and execution log of an idea")
    .argument("<id>", "Idea id")
    .action((id: string, _options, command: Command) => poolHistoryCommand(id, command.optsWithGlobals()));

pool
    .command("overview")
    .description("Summarize the pool: counts, success rate, revenue and executions")
    .action((_options, command: Command) => poolOverviewCommand(command.optsWithGlobals()));

await program.parseAsync(process.argv);
