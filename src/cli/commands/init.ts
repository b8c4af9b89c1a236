import * as p from "@clack/prompts";
import chalk from "chalk";
import fs from "fs/promises";
import path from "path";
import { CONFIG_FILE, PREFERENCES_FILE, reportFailure } from "../context.js";
import { defaultPreferences, renderConfig, renderPreferences } from "../templates/index.js";
import type { UserPreferences } from "../../schemas/preferences.js";

async function safeWrite(filePath: string, content: string) {
    try {
        await fs.access(filePath);
        p.log.warn(`Skipped ${chalk.cyan(path.basename(filePath))} (already exists)`);
    } catch {
        await fs.writeFile(filePath, content);
    }
}

function validateNumber(max?: number) {
    return (value: string | undefined) => {
        const parsed = Number(value);
        if (!value || !Number.isFinite(parsed) || parsed < 0) return "Enter a non-negative number.";
        if (max !== undefined && parsed > max) return `Enter a number no larger than ${max}.`;
        return undefined;
    };
}

function splitList(value: string): string[] {
    return value
        .split(",")
        .map((item) => item.trim())
        .filter(Boolean);
}

/** Ask for the preference fields; null when the user cancels. */
async function askPreferences(): Promise<UserPreferences | null> {
    const budget = await p.text({
        message: "Launch budget (in your idea currency):",
        initialValue: String(defaultPreferences.budget),
        validate: validateNumber(),
    });
    if (p.isCancel(budget)) return null;

    const hours = await p.text({
        message: "Hours per day you can spend:",
        initialValue: String(defaultPreferences.available_hours_per_day),
        validate: validateNumber(24),
    });
    if (p.isCancel(hours)) return null;

    const skills = await p.text({
        message: "Skills (comma separated):",
        initialValue: defaultPreferences.skills.join(", "),
    });
    if (p.isCancel(skills)) return null;

    const interests = await p.text({
        message: "Interests (comma separated):",
        initialValue: defaultPreferences.interests.join(", "),
    });
    if (p.isCancel(interests)) return null;

    return {
        budget: Number(budget),
        available_hours_per_day: Number(hours),
        skills: splitList(skills),
        interests: splitList(interests),
    };
}

export async function initCommand(options?: { yes?: boolean }) {
    p.intro(chalk.bgCyan.black(" trendmint - Initialize "));

    const cwd = process.cwd();
    const isReady = options?.yes
        ? true
        : await p.confirm({
            message: `Create ${CONFIG_FILE} and ${PREFERENCES_FILE} in ${cwd}?`,
            initialValue: true,
        });

    if (p.isCancel(isReady) || !isReady) {
        p.cancel("Operation cancelled.");
        return;
    }

    const preferences = options?.yes ? defaultPreferences : await askPreferences();
    if (!preferences) {
        p.cancel("Operation cancelled.");
        return;
    }

    const s = p.spinner();
    s.start("Writing configuration...");

    try {
        await safeWrite(path.join(cwd, CONFIG_FILE), renderConfig());
        await safeWrite(path.join(cwd, PREFERENCES_FILE), renderPreferences(preferences));

        s.stop("Configuration written.");

        p.note(
            `1. Review ${chalk.cyan(CONFIG_FILE)} and ${chalk.cyan(PREFERENCES_FILE)}\n` +
            `2. Optionally raise the GitHub rate limit: ${chalk.green("export GITHUB_TOKEN=...")}\n` +
            `3. Find ideas: ${chalk.magenta("trendmint run")}`,
            "Next Steps"
        );

        p.outro(chalk.green("Ready to mine trending repositories."));
    } catch (error) {
        s.stop("Failed to write configuration.");
        reportFailure(error);
    }
}
