import type { AppConfigInput } from "../../schemas/config.js";
import type { UserPreferences } from "../../schemas/preferences.js";

/** Starting overrides; every omitted setting keeps its default. */
export const configTemplate: AppConfigInput = {
    source: {
        window: "weekly",
        limit: 20,
        min_stars: 50,
        queries: ["AI LLM agent", "AI automation", "chatbot GPT", "AI agent framework", "LLM tools"],
    },
    generation: {
        currency: "CNY",
    },
    matching: {
        include_terminal: false,
    },
};

export const defaultPreferences: UserPreferences = {
    budget: 1000,
    available_hours_per_day: 2,
    skills: ["python", "ai", "web"],
    interests: ["ai tools", "automation", "saas"],
};

export function renderConfig(config: AppConfigInput = configTemplate): string {
    return `${JSON.stringify(config, null, 2)}\n`;
}

export function renderPreferences(preferences: UserPreferences = defaultPreferences): string {
    return `${JSON.stringify(preferences, null, 2)}\n`;
}
