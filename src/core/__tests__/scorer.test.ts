/**
 * Scorer Tests — Signals, category selection and potential bands.
 */
import { describe, it, expect } from "vitest";
import { Scorer, toPhraseText } from "../scorer.js";
import { RepositoryRecord } from "../../schemas/repository.js";
import type { RepositoryRecordInput } from "../../schemas/repository.js";
import { ScoringConfig } from "../../schemas/config.js";

function record(overrides: Partial<RepositoryRecordInput> = {}): RepositoryRecord {
    return RepositoryRecord.parse({
        owner: "acme",
        name: "agent-kit",
        description: "An autonomous coding agent",
        language: "TypeScript",
        stars: 500,
        star_growth: 200,
        topics: ["ai", "agent"],
        url: "https://github.com/acme/agent-kit",
        ...overrides,
    });
}

const scorer = new Scorer(ScoringConfig.parse({}));

function velocityOnly(): Scorer {
    return new Scorer(
        ScoringConfig.parse({ weights: { velocity: 1, magnitude: 0, topics: 0, language: 0, keywords: 0 } }),
    );
}

describe("toPhraseText", () => {
    it("pads lower-cased words and keeps + and #", () => {
        expect(toPhraseText("Self-Hosted, C# & C++!")).toBe(" self hosted c# c++ ");
    });

    it("returns a single-space pair for empty text", () => {
        expect(toPhraseText("")).toBe("  ");
    });
});

describe("Scorer", () => {
    it("scores a fast-growing AI agent repository as high-potential tooling", () => {
        const result = scorer.score(record());
        expect(result.score).toBe(93.5);
        expect(result.category).toBe("tooling");
        expect(result.potential).toBe("high");
        expect(result.breakdown.velocity).toBe(1);
        expect(result.breakdown.topics).toBe(1);
        expect(result.breakdown.language).toBe(1);
        expect(result.breakdown.keywords).toBe(1);
        expect(result.breakdown.magnitude).toBeCloseTo(0.675, 3);
    });

    it("explains each signal that fired", () => {
        const { signals } = scorer.score(record());
        expect(signals).toEqual([
            "+200 stars over the window (velocity 1.00)",
            "500 stars (magnitude 0.67)",
            "monetization topics: ai, agent",
            "language TypeScript (weight 1.00)",
            "description keywords: agent, coding, autonomous",
            "category tooling from the strongest signal group",
        ]);
    });

    it("gives an empty record score 0 and no category", () => {
        const result = scorer.score(
            record({ description: "", language: null, stars: 0, star_growth: 0, topics: [] }),
        );
        expect(result.score).toBe(0);
        expect(result.category).toBeNull();
        expect(result.potential).toBe("low");
        expect(result.signals).toEqual([]);
    });

    it("uses the default weight for an unlisted language", () => {
        expect(scorer.score(record({ language: "Elixir" })).breakdown.language).toBe(0.3);
    });

    it("matches language weights case-insensitively", () => {
        expect(scorer.score(record({ language: "RUST" })).breakdown.language).toBe(0.9);
    });

    it("clamps every signal to [0, 1]", () => {
        const { breakdown, score } = scorer.score(record({ stars: 5_000_000, star_growth: 90_000 }));
        for (const value of Object.values(breakdown)) {
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThanOrEqual(1);
        }
        expect(score).toBeLessThanOrEqual(100);
    });

    it("matches keywords on word boundaries only", () => {
        const result = scorer.score(record({ description: "Aim for rapid prototyping", topics: [] }));
        expect(result.breakdown.keywords).toBe(0);
        expect(result.category).toBeNull();
    });

    it("matches multi-word keywords across punctuation", () => {
        const result = scorer.score(record({ description: "Self-hosted dashboard with an API", topics: ["saas", "dashboard"] }));
        expect(result.category).toBe("managed-service");
    });

    it("breaks category ties by priority", () => {
        expect(scorer.score(record({ description: "", topics: ["cli", "saas"] })).category).toBe("tooling");
        expect(scorer.score(record({ description: "", topics: ["tutorial", "framework"] })).category).toBe(
            "consulting",
        );
    });

    it("lets a stronger later group win", () => {
        const result = scorer.score(record({ description: "", topics: ["cli", "tutorial", "education"] }));
        expect(result.category).toBe("training-content");
    });

    it("is deterministic", () => {
        expect(scorer.score(record())).toEqual(scorer.score(record()));
    });

    it("bands potential by the configured thresholds", () => {
        const custom = velocityOnly();
        expect(custom.score(record({ star_growth: 160 })).score).toBe(80);
        expect(custom.score(record({ star_growth: 160 })).potential).toBe("high");
        expect(custom.score(record({ star_growth: 120 })).potential).toBe("medium");
        expect(custom.score(record({ star_growth: 40 })).potential).toBe("low");
    });
});
