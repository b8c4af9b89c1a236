/**
 * Orchestrator — One pipeline run, start to finish.
 *
 *   1. Fetch — ask the trending source for a batch of repositories
 *   2. Score — validate and score every record
 *   3. Generate — expand scored records into ideas
 *   4. Dedupe — insert new ideas into the pool, skip the ones it already has
 *   5. Match — filter and rank against the user's preferences
 *
 * A failed fetch aborts the run with one `FetchError` before anything is
 * written. Malformed records and duplicates are reported through callbacks
 * and in the result, never thrown.
 */
import { Scorer } from "./core/scorer.js";
import { IdeaGenerator } from "./core/generator.js";
import { PreferenceMatcher } from "./core/matcher.js";
import type { RankedIdea } from "./core/matcher.js";
import { DuplicateIdeaError, FetchError, ValidationError } from "./errors/index.js";
import { RepositoryRecord } from "./schemas/repository.js";
import type { RepositoryRecordInput } from "./schemas/repository.js";
import type { ScoreResult } from "./schemas/score.js";
import type { Idea } from "./schemas/idea.js";
import type { UserPreferences } from "./schemas/preferences.js";
import type { AppConfig, TrendingWindow } from "./schemas/config.js";
import type { AssetPool } from "./memory/pool.js";
import type { TrendingSource } from "./sources/types.js";

export type PipelineStage = "fetch" | "score" | "generate" | "dedupe" | "match" | "done";

/** The three pure pipeline components, built from one configuration. */
export interface PipelineComponents {
    scorer: Scorer;
    generator: IdeaGenerator;
    matcher: PreferenceMatcher;
}

export function createComponents(config: AppConfig, options: { now?: () => Date } = {}): PipelineComponents {
    return {
        scorer: new Scorer(config.scoring),
        generator: new IdeaGenerator(config.generation, { now: options.now }),
        matcher: new PreferenceMatcher(config.matching),
    };
}

export interface ScoredRepository {
    record: RepositoryRecord;
    score: ScoreResult;
}

export interface PipelineOptions extends PipelineComponents {
    source: TrendingSource;
    pool: AssetPool;
    preferences: UserPreferences;
    window: TrendingWindow;
    /** Repositories requested from the source. */
    fetchLimit: number;
    /** Truncate the ranked ideas. Default: no limit */
    limit?: number;
    /** Write new ideas to the pool. When false, dedupe only reads it. Default: true */
    persist?: boolean;
    /** Rank the pool's live versions of skipped ideas alongside new ones. Default: false */
    includeExisting?: boolean;
    signal?: AbortSignal;
    /** Callback for stage changes. */
    onStageChange?: (stage: PipelineStage) => void;
    /** Callback for each record skipped as malformed. */
    onInvalidRecord?: (error: ValidationError) => void;
    /** Callback for each idea the pool already holds. */
    onDuplicate?: (idea: Idea, error: DuplicateIdeaError) => void;
    /** Callback for each idea written to the pool. */
    onIdeaStored?: (idea: Idea) => void;
}

export interface PipelineResult {
    /** Ranked ideas, best first. */
    ideas: Idea[];
    /** Same order as `ideas`, with affinity for reporting. */
    ranked: RankedIdea[];
    scored: ScoredRepository[];
    /** New ideas this run wrote (empty when `persist` is false). */
    inserted: Idea[];
    skipped: DuplicateIdeaError[];
    invalid: ValidationError[];
}

/** Validate one fetched record at the boundary. */
export function parseRepository(input: RepositoryRecordInput): RepositoryRecord {
    const result = RepositoryRecord.safeParse(input);
    if (!result.success) {
        throw new ValidationError(
            result.error.issues.map((issue) => `${issue.path.map(String).join(".") || "record"}: ${issue.message}`),
            input,
        );
    }
    return result.data;
}

/**
 * Run the full pipeline once.
 * @throws FetchError when the source fails; nothing is written in that case
 */
export async function runPipeline(options: PipelineOptions): Promise<PipelineResult> {
    const {
        source,
        pool,
        scorer,
        generator,
        matcher,
        preferences,
        window,
        fetchLimit,
        limit,
        persist = true,
        includeExisting = false,
        signal,
        onStageChange,
        onInvalidRecord,
        onDuplicate,
        onIdeaStored,
    } = options;

    // --- Phase 1: Fetch ---
    onStageChange?.("fetch");
    let fetched: RepositoryRecordInput[];
    try {
        fetched = await source.fetchTrending({ window, limit: fetchLimit, signal });
    } catch (error) {
        if (error instanceof FetchError) throw error;
        throw new FetchError(error instanceof Error ? error.message : String(error), { cause: error });
    }

    // --- Phase 2: Score ---
    onStageChange?.("score");
    const invalid: ValidationError[] = [];
    const scored: ScoredRepository[] = [];
    for (const input of fetched) {
        try {
            const record = parseRepository(input);
            scored.push({ record, score: scorer.score(record) });
        } catch (error) {
            if (!(error instanceof ValidationError)) throw error;
            invalid.push(error);
            onInvalidRecord?.(error);
        }
    }

    // --- Phase 3: Generate ---
    onStageChange?.("generate");
    const generated = scored.flatMap(({ record, score }) => generator.generate(record, score));

    // --- Phase 4: Dedupe against the pool ---
    onStageChange?.("dedupe");
    const candidates: Idea[] = [];
    const inserted: Idea[] = [];
    const skipped: DuplicateIdeaError[] = [];
    const seenThisRun = new Set<string>();

    const skip = (idea: Idea, error: DuplicateIdeaError) => {
        skipped.push(error);
        onDuplicate?.(idea, error);
        if (includeExisting && !seenThisRun.has(idea.idea_id)) {
            const existing = pool.get(idea.idea_id);
            if (existing) candidates.push(existing);
        }
    };

    for (const idea of generated) {
        if (persist) {
            try {
                const stored = pool.insert(idea);
                inserted.push(stored);
                candidates.push(stored);
                onIdeaStored?.(stored);
            } catch (error) {
                if (!(error instanceof DuplicateIdeaError)) throw error;
                skip(idea, error);
            }
        } else if (seenThisRun.has(idea.idea_id) || pool.contains(idea.idea_id)) {
            skip(idea, new DuplicateIdeaError(idea.idea_id));
        } else {
            candidates.push(idea);
        }
        seenThisRun.add(idea.idea_id);
    }

    // --- Phase 5: Match preferences ---
    onStageChange?.("match");
    const ranked = matcher.rank(candidates, preferences, { limit });

    onStageChange?.("done");
    return {
        ideas: ranked.map((r) => r.idea),
        ranked,
        scored,
        inserted,
        skipped,
        invalid,
    };
}

export interface AnalysisResult extends ScoredRepository {
    ideas: Idea[];
    /** Present when preferences were supplied. */
    ranked?: RankedIdea[];
}

/**
 * Score one repository and generate its ideas without touching the pool.
 * @throws ValidationError when the record is malformed
 */
export function analyzeRepository(
    input: RepositoryRecordInput,
    components: PipelineComponents,
    preferences?: UserPreferences,
): AnalysisResult {
    const record = parseRepository(input);
    const score = components.scorer.score(record);
    const ideas = components.generator.generate(record, score);
    if (!preferences) {
        return { record, score, ideas };
    }
    return { record, score, ideas, ranked: components.matcher.rank(ideas, preferences) };
}
