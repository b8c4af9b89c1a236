/**
 * Orchestrator Tests — Full pipeline runs against an in-memory pool and a
 * scripted trending source.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { analyzeRepository, createComponents, runPipeline } from "../orchestrator.js";
import type { PipelineOptions, PipelineStage } from "../orchestrator.js";
import { AssetPool } from "../memory/pool.js";
import { SqliteDatabase } from "../memory/sqlite.js";
import { AppConfig } from "../schemas/config.js";
import type { RepositoryRecordInput } from "../schemas/repository.js";
import type { UserPreferences } from "../schemas/preferences.js";
import type { TrendingRequest, TrendingSource } from "../sources/types.js";
import { FetchError, ValidationError } from "../errors/index.js";
import { defaultPreferences } from "../cli/templates/index.js";

const NOW = new Date("2026-10-19T08:00:00.000Z");

const AGENT_KIT: RepositoryRecordInput = {
    owner: "acme",
    name: "agent-kit",
    description: "An autonomous coding agent",
    language: "TypeScript",
    stars: 500,
    star_growth: 200,
    topics: ["ai", "agent"],
    url: "https://github.com/acme/agent-kit",
};

const PREFS: UserPreferences = {
    budget: 1000,
    available_hours_per_day: 8,
    skills: ["python", "ai", "web"],
    interests: ["ai tools", "automation", "saas"],
};

class ScriptedSource implements TrendingSource {
    readonly requests: TrendingRequest[] = [];

    constructor(private readonly result: RepositoryRecordInput[] | Error) {}

    async fetchTrending(request: TrendingRequest): Promise<RepositoryRecordInput[]> {
        this.requests.push(request);
        if (this.result instanceof Error) throw this.result;
        return this.result;
    }
}

let pool: AssetPool;

beforeEach(() => {
    pool = new AssetPool(new SqliteDatabase(":memory:"), { now: () => NOW });
});

afterEach(() => {
    pool.close();
});

function options(source: TrendingSource, overrides: Partial<PipelineOptions> = {}): PipelineOptions {
    return {
        ...createComponents(AppConfig.parse({}), { now: () => NOW }),
        source,
        pool,
        preferences: PREFS,
        window: "weekly",
        fetchLimit: 20,
        ...overrides,
    };
}

describe("runPipeline", () => {
    it("turns a trending agent repository into ranked, stored ideas", async () => {
        const source = new ScriptedSource([AGENT_KIT]);
        const result = await runPipeline(options(source));

        expect(source.requests).toEqual([{ window: "weekly", limit: 20, signal: undefined }]);
        expect(result.scored).toHaveLength(1);
        expect(result.scored[0]?.score.score).toBe(93.5);
        expect(result.scored[0]?.score.category).toBe("tooling");
        expect(result.inserted).toHaveLength(3);
        expect(result.ideas.map((i) => i.pathway)).toEqual([
            "custom-development",
            "training-course",
            "deploy-service",
        ]);
        expect(result.ideas.every((i) => i.status === "proposed")).toBe(true);
        expect(pool.list()).toHaveLength(3);
    });

    it("reports stages in order", async () => {
        const stages: PipelineStage[] = [];
        await runPipeline(options(new ScriptedSource([AGENT_KIT]), { onStageChange: (s) => stages.push(s) }));
        expect(stages).toEqual(["fetch", "score", "generate", "dedupe", "match", "done"]);
    });

    it("skips ideas the pool already holds on the next run", async () => {
        await runPipeline(options(new ScriptedSource([AGENT_KIT])));
        const onDuplicate = vi.fn();

        const second = await runPipeline(options(new ScriptedSource([AGENT_KIT]), { onDuplicate }));

        expect(second.inserted).toEqual([]);
        expect(second.skipped).toHaveLength(3);
        expect(second.ideas).toEqual([]);
        expect(onDuplicate).toHaveBeenCalledTimes(3);
        expect(pool.list()).toHaveLength(3);
    });

    it("can rank the pool's copies of skipped ideas", async () => {
        const first = await runPipeline(options(new ScriptedSource([AGENT_KIT])));
        pool.updateStatus(first.ideas[0]?.idea_id ?? "", "accepted");

        const second = await runPipeline(options(new ScriptedSource([AGENT_KIT]), { includeExisting: true }));

        expect(second.ideas).toHaveLength(3);
        expect(second.ideas[0]?.status).toBe("accepted");
    });

    it("filters by budget", async () => {
        const result = await runPipeline(
            options(new ScriptedSource([AGENT_KIT]), { preferences: { ...PREFS, budget: 100 } }),
        );
        expect(result.ideas.map((i) => i.pathway)).toEqual(["training-course", "deploy-service"]);
        expect(result.inserted).toHaveLength(3);
    });

    it("ranks the ideas a two-hours-a-day profile can launch", async () => {
        const result = await runPipeline(
            options(new ScriptedSource([AGENT_KIT]), { preferences: defaultPreferences }),
        );
        expect(result.ideas.map((i) => i.pathway)).toEqual(["deploy-service"]);
        expect(result.inserted).toHaveLength(3);
    });

    it("truncates to the limit", async () => {
        const result = await runPipeline(options(new ScriptedSource([AGENT_KIT]), { limit: 1 }));
        expect(result.ideas.map((i) => i.pathway)).toEqual(["custom-development"]);
    });

    it("writes nothing on a dry run", async () => {
        const result = await runPipeline(
            options(new ScriptedSource([AGENT_KIT, AGENT_KIT]), { persist: false }),
        );
        expect(result.inserted).toEqual([]);
        expect(result.ideas).toHaveLength(3);
        expect(result.skipped).toHaveLength(3);
        expect(pool.list()).toEqual([]);
    });

    it("skips malformed records and keeps the rest", async () => {
        const onInvalidRecord = vi.fn();
        const broken: RepositoryRecordInput = { ...AGENT_KIT, owner: "", url: "not a url" };

        const result = await runPipeline(
            options(new ScriptedSource([broken, AGENT_KIT]), { onInvalidRecord }),
        );

        expect(result.invalid).toHaveLength(1);
        expect(result.invalid[0]).toBeInstanceOf(ValidationError);
        expect(result.invalid[0]?.issues[0]).toMatch(/^owner: /);
        expect(result.invalid[0]?.input).toBe(broken);
        expect(onInvalidRecord).toHaveBeenCalledTimes(1);
        expect(result.scored).toHaveLength(1);
        expect(result.inserted).toHaveLength(3);
    });

    it("produces no ideas for a repository without monetization signals", async () => {
        const plain: RepositoryRecordInput = {
            owner: "acme",
            name: "left-pad",
            description: "Pads strings",
            language: "Go",
            stars: 60,
            star_growth: 60,
            url: "https://github.com/acme/left-pad",
        };
        const result = await runPipeline(options(new ScriptedSource([plain])));
        expect(result.scored[0]?.score.category).toBeNull();
        expect(result.ideas).toEqual([]);
    });

    it("returns nothing for an empty batch", async () => {
        const result = await runPipeline(options(new ScriptedSource([])));
        expect(result.ideas).toEqual([]);
        expect(result.scored).toEqual([]);
    });

    it("wraps a source failure in FetchError and writes nothing", async () => {
        const run = runPipeline(options(new ScriptedSource(new Error("socket hang up"))));
        await expect(run).rejects.toThrow(FetchError);
        await expect(run).rejects.toThrow("Fetch failed: socket hang up");
        expect(pool.list()).toEqual([]);
    });

    it("passes a FetchError from the source through unchanged", async () => {
        const original = new FetchError("GitHub API responded 403", { status: 403 });
        await expect(runPipeline(options(new ScriptedSource(original)))).rejects.toBe(original);
    });
});

describe("analyzeRepository", () => {
    const components = createComponents(AppConfig.parse({}), { now: () => NOW });

    it("scores one repository and generates its ideas", () => {
        const analysis = analyzeRepository(AGENT_KIT, components);
        expect(analysis.record.full_name).toBe("acme/agent-kit");
        expect(analysis.score.score).toBe(93.5);
        expect(analysis.ideas).toHaveLength(3);
        expect(analysis.ranked).toBeUndefined();
    });

    it("ranks the ideas when preferences are given", () => {
        const analysis = analyzeRepository(AGENT_KIT, components, { ...PREFS, budget: 100 });
        expect(analysis.ranked?.map((r) => r.idea.pathway)).toEqual(["training-course", "deploy-service"]);
    });

    it("ranks with the preferences written by init", () => {
        const analysis = analyzeRepository(AGENT_KIT, components, defaultPreferences);
        expect(analysis.ranked?.map((r) => r.idea.pathway)).toEqual(["deploy-service"]);
    });

    it("throws ValidationError for a malformed record", () => {
        expect(() => analyzeRepository({ ...AGENT_KIT, url: "" }, components)).toThrow(ValidationError);
    });
});
