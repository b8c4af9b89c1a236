/**
 * CLI context — Resolves file locations and loads what every command needs.
 *
 * Precedence for each path: command-line flag, then environment variable,
 * then the default next to the working directory (or, for the pool, the
 * configured `pool.db_path`).
 */
import { existsSync, readFileSync } from "fs";
import path from "path";
import * as p from "@clack/prompts";
import chalk from "chalk";
import { InvalidArgumentError } from "commander";
import { ConfigError } from "../errors/index.js";
import { loadConfig } from "../schemas/config.js";
import type { AppConfig } from "../schemas/config.js";
import { UserPreferences } from "../schemas/preferences.js";

export const CONFIG_FILE = "trendmint.config.json";
export const PREFERENCES_FILE = "preferences.json";

export interface PathOptions {
    config?: string;
    preferences?: string;
    db?: string;
}

export interface CliContext {
    config: AppConfig;
    configPath: string;
    preferencesPath: string;
    dbPath: string;
}

type Env = Record<string, string | undefined>;

export function resolveConfigPath(options: PathOptions, env: Env = process.env, cwd: string = process.cwd()): string {
    return path.resolve(cwd, options.config || env.TRENDMINT_CONFIG || CONFIG_FILE);
}

export function resolvePreferencesPath(
    options: PathOptions,
    env: Env = process.env,
    cwd: string = process.cwd(),
): string {
    return path.resolve(cwd, options.preferences || env.TRENDMINT_PREFERENCES || PREFERENCES_FILE);
}

export function resolveDbPath(
    options: PathOptions,
    config: AppConfig,
    env: Env = process.env,
    cwd: string = process.cwd(),
): string {
    const dbPath = options.db || env.TRENDMINT_DB_PATH || config.pool.db_path;
    return dbPath === ":memory:" ? dbPath : path.resolve(cwd, dbPath);
}

export function loadCliContext(options: PathOptions, env: Env = process.env, cwd: string = process.cwd()): CliContext {
    const configPath = resolveConfigPath(options, env, cwd);
    const config = loadConfig(configPath);
    return {
        config,
        configPath,
        preferencesPath: resolvePreferencesPath(options, env, cwd),
        dbPath: resolveDbPath(options, config, env, cwd),
    };
}

/**
 * Read and validate a preferences file.
 * @throws ConfigError when the file is missing, unreadable or invalid
 */
export function loadPreferences(filePath: string): UserPreferences {
    if (!existsSync(filePath)) {
        throw new ConfigError(filePath, [`file not found; run "trendmint init" to create one`]);
    }

    let content: unknown;
    try {
        content = JSON.parse(readFileSync(filePath, "utf-8"));
    } catch (error) {
        throw new ConfigError(filePath, [error instanceof Error ? error.message : String(error)]);
    }

    const result = UserPreferences.safeParse(content);
    if (!result.success) {
        throw new ConfigError(
            filePath,
            result.error.issues.map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`),
        );
    }
    return result.data;
}

/** Preferences when the file exists, otherwise undefined. Invalid files still throw. */
export function loadOptionalPreferences(filePath: string): UserPreferences | undefined {
    return existsSync(filePath) ? loadPreferences(filePath) : undefined;
}

/** Accepts `https://github.com/owner/name[.git][/...]` or plain `owner/name`. */
export function parseRepositoryRef(ref: string): { owner: string; name: string } | null {
    const trimmed = ref.trim();
    const match =
        /github\.com[/:]([\w.-]+)\/([\w.-]+?)(?:\.git)?(?:[/?#].*)?$/i.exec(trimmed) ??
        /^([\w.-]+)\/([\w.-]+?)(?:\.git)?$/.exec(trimmed);
    if (!match) return null;
    const [, owner, name] = match;
    if (!owner || !name) return null;
    return { owner, name };
}

// --- commander argument parsers ---

export function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError("Expected a positive integer.");
    }
    return parsed;
}

export function parseAmount(value: string): number {
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed < 0) {
        throw new InvalidArgumentError("Expected a non-negative amount.");
    }
    return parsed;
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/** Print a command failure and mark the process as failed. */
export function reportFailure(error: unknown): void {
    p.log.error(chalk.red(describeError(error)));
    if (error instanceof ConfigError && error.issues.length > 1) {
        for (const issue of error.issues) {
            p.log.message(chalk.dim(`  ${issue}`));
        }
    }
    process.exitCode = 1;
}
