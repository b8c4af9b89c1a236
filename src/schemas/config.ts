/**
 * Configuration — All tunable parameters in one place.
 *
 * `AppConfig.parse({})` yields a complete configuration. Word lists, language
 * weights and pathway templates default to the tables in `data/`; everything
 * else defaults inline. The parsed object is handed to the Scorer, Generator
 * and Matcher at construction and never read from process-wide state.
 */
import { readFileSync, existsSync } from "fs";
import { homedir } from "os";
import path from "path";
import { z } from "zod/v4";
import { ConfigError } from "../errors/index.js";
import { Category } from "./score.js";
import { TopicTag } from "./repository.js";
import { EstimateRange, Pathway } from "./idea.js";

function readDataFile(fileName: string): unknown {
    const url = new URL(`../../data/${fileName}`, import.meta.url);
    return JSON.parse(readFileSync(url, "utf-8"));
}

function uniqueEntries<T>(values: readonly T[]): boolean {
    return new Set(values).size === values.length;
}

// --- Scoring ---

/** Topics and description keywords that point at one category. */
export const SignalGroup = z.object({
    topics: z.array(TopicTag),
    keywords: z.array(z.string().trim().toLowerCase().min(1)),
});
export type SignalGroup = z.infer<typeof SignalGroup>;

const ScoringTables = z.object({
    signal_groups: z.record(Category, SignalGroup),
    language_weights: z.record(z.string(), z.number().min(0).max(1)),
});

const SCORING_TABLES = ScoringTables.parse(readDataFile("scoring.json"));

export const SignalWeights = z
    .object({
        velocity: z.number().nonnegative().default(0.3),
        magnitude: z.number().nonnegative().default(0.2),
        topics: z.number().nonnegative().default(0.2),
        language: z.number().nonnegative().default(0.1),
        keywords: z.number().nonnegative().default(0.2),
    })
    .refine((w) => w.velocity + w.magnitude + w.topics + w.language + w.keywords > 0, {
        message: "at least one signal weight must be positive",
    });
export type SignalWeights = z.infer<typeof SignalWeights>;

export const ScoringConfig = z.object({
    weights: SignalWeights.prefault({}),
    /** Bounds every signal is clamped to before weighting. */
    clamp: z
        .object({
            min: z.number().min(0).max(1).default(0),
            max: z.number().min(0).max(1).default(1),
        })
        .refine((c) => c.min <= c.max, { message: "clamp.min must not exceed clamp.max" })
        .prefault({}),
    /** Stars gained over the window that saturate the velocity signal. */
    velocity_saturation: z.number().positive().default(200),
    /** Absolute stars that saturate the log-scaled magnitude signal. */
    magnitude_saturation: z.number().positive().default(10000),
    topic_saturation: z.number().int().positive().default(2),
    keyword_saturation: z.number().int().positive().default(2),
    language_weights: z
        .record(z.string(), z.number().min(0).max(1))
        .default(() => ({ ...SCORING_TABLES.language_weights })),
    /** Weight for a known language missing from `language_weights`. */
    default_language_weight: z.number().min(0).max(1).default(0.3),
    signal_groups: z
        .record(Category, SignalGroup)
        .default(() => structuredClone(SCORING_TABLES.signal_groups)),
    thresholds: z
        .object({
            high: z.number().min(0).max(100).default(70),
            medium: z.number().min(0).max(100).default(50),
        })
        .refine((t) => t.medium <= t.high, { message: "thresholds.medium must not exceed thresholds.high" })
        .prefault({}),
});
export type ScoringConfig = z.infer<typeof ScoringConfig>;

// --- Generation ---

/** Base estimates and copy for one monetization pathway. */
export const PathwayTemplate = z.object({
    /** `{project}` is replaced with the repository name. */
    title: z.string().min(1),
    description: z.string().min(1),
    audience: z.array(z.string().min(1)),
    cost: EstimateRange,
    revenue: EstimateRange,
    time_days: EstimateRange,
});
export type PathwayTemplate = z.infer<typeof PathwayTemplate>;

const PathwayList = z
    .array(Pathway)
    .max(4)
    .refine(uniqueEntries, { message: "pathways must not repeat" });

const PathwayTables = z.object({
    templates: z.record(Pathway, PathwayTemplate),
    affinity: z.record(Category, PathwayList),
});

const PATHWAY_TABLES = PathwayTables.parse(readDataFile("pathways.json"));

export const GenerationConfig = z.object({
    templates: z.record(Pathway, PathwayTemplate).default(() => structuredClone(PATHWAY_TABLES.templates)),
    /** Which pathways apply to each category, in output order. */
    affinity: z.record(Category, PathwayList).default(() => structuredClone(PATHWAY_TABLES.affinity)),
    /**
     * Revenue multiplier at score 0 (`low`) and score 100 (`high`),
     * interpolated linearly in between.
     */
    revenue_anchors: z
        .object({
            low: z.number().nonnegative().default(0.5),
            high: z.number().nonnegative().default(1.5),
        })
        .refine((a) => a.low <= a.high, { message: "revenue_anchors.low must not exceed revenue_anchors.high" })
        .prefault({}),
    /** ISO 4217 code attached to every estimate. */
    currency: z.string().length(3).toUpperCase().default("CNY"),
});
export type GenerationConfig = z.infer<typeof GenerationConfig>;

// --- Matching ---

export const MatchingConfig = z.object({
    /**
     * Total hours of work each pathway needs before launch. The work is
     * spread over the fastest launch time, never over less than one day.
     */
    effort_hours: z
        .record(Pathway, z.number().min(0))
        .default(() => ({
            "deploy-service": 2,
            consulting: 1,
            "training-course": 12,
            "custom-development": 40,
        })),
    /** Keep `monetized`/`rejected` ideas in ranked output. */
    include_terminal: z.boolean().default(false),
});
export type MatchingConfig = z.infer<typeof MatchingConfig>;

// --- Trending source ---

export const TrendingWindow = z.enum(["daily", "weekly", "monthly"]);
export type TrendingWindow = z.infer<typeof TrendingWindow>;

export const SourceConfig = z.object({
    api_url: z.url().default("https://api.github.com"),
    window: TrendingWindow.default("weekly"),
    /** Maximum repositories handed to the pipeline per run. */
    limit: z.number().int().positive().default(20),
    min_stars: z.number().int().nonnegative().default(50),
    per_page: z.number().int().min(1).max(100).default(20),
    /** One repository search per entry. */
    queries: z
        .array(z.string().min(1))
        .min(1)
        .default(() => ["AI LLM agent", "AI automation", "chatbot GPT", "AI agent framework", "LLM tools"]),
    /** Repositories whose name or description contains one of these are dropped. */
    exclude_keywords: z
        .array(z.string().toLowerCase())
        .default(() => ["awesome-", "tutorial", "course", "book"]),
    timeout_ms: z.number().int().positive().default(10000),
    max_retries: z.number().int().nonnegative().default(3),
    retry_initial_delay_ms: z.number().int().nonnegative().default(1000),
    concurrency: z.number().int().positive().default(2),
});
export type SourceConfig = z.infer<typeof SourceConfig>;
export type SourceConfigInput = z.input<typeof SourceConfig>;

// --- Pool ---

export const PoolConfig = z.object({
    db_path: z.string().min(1).default(() => path.join(homedir(), ".trendmint", "pool.db")),
});
export type PoolConfig = z.infer<typeof PoolConfig>;

/**
 * The single configuration object. Sections may be omitted or partially
 * specified; missing values fall back to their defaults.
 */
export const AppConfig = z.object({
    scoring: ScoringConfig.prefault({}),
    generation: GenerationConfig.prefault({}),
    matching: MatchingConfig.prefault({}),
    source: SourceConfig.prefault({}),
    pool: PoolConfig.prefault({}),
});
export type AppConfig = z.infer<typeof AppConfig>;
export type AppConfigInput = z.input<typeof AppConfig>;

/**
 * Load the configuration from a JSON file. A missing file yields the
 * defaults; an unreadable or invalid one throws `ConfigError`.
 */
export function loadConfig(filePath?: string): AppConfig {
    if (!filePath || !existsSync(filePath)) {
        return AppConfig.parse({});
    }

    let content: unknown;
    try {
        content = JSON.parse(readFileSync(filePath, "utf-8"));
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigError(filePath, [reason]);
    }

    const result = AppConfig.safeParse(content);
    if (!result.success) {
        throw new ConfigError(
            filePath,
            result.error.issues.map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`),
        );
    }
    return result.data;
}
