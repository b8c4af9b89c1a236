import chalk from "chalk";
import { describe, it, expect, beforeAll } from "vitest";
import {
    formatDays,
    formatExecutionLog,
    formatHistory,
    formatIdeaRow,
    formatMoney,
    formatOverview,
    formatRankedIdea,
    formatRevenueStats,
    formatScore,
} from "../report.js";
import { RepositoryRecord } from "../../schemas/repository.js";
import type { Idea } from "../../schemas/idea.js";

beforeAll(() => {
    chalk.level = 0;
});

const IDEA: Idea = {
    idea_id: "0f8fad5b-d9cb-469f-a165-70867728950e",
    title: "agent-kit deployment service",
    description: "Host agent-kit for customers.",
    target_users: ["founders"],
    tags: ["ai"],
    pathway: "deploy-service",
    launch_cost: { min: 100, max: 500 },
    monthly_revenue: { min: 2870, max: 14350 },
    time_to_launch_days: { min: 1, max: 3 },
    currency: "USD",
    potential_score: 93.5,
    source_full_name: "acme/agent-kit",
    source_url: "https://github.com/acme/agent-kit",
    created_at: "2026-10-19T08:00:00.000Z",
    status: "proposed",
    realized_revenue: [],
};

describe("formatMoney", () => {
    it("formats whole amounts with the currency symbol", () => {
        expect(formatMoney(14350, "USD")).toBe("$14,350");
        expect(formatMoney(100, "CNY")).toBe("CN¥100");
    });

    it("falls back to a bare number for a malformed currency code", () => {
        expect(formatMoney(100, "X1Y")).toBe("100 X1Y");
    });
});

describe("formatDays", () => {
    it("shows a range or a single value", () => {
        expect(formatDays({ min: 0.5, max: 2 })).toBe("0.5-2 days");
        expect(formatDays({ min: 3, max: 3 })).toBe("3 days");
    });
});

describe("formatRankedIdea", () => {
    it("renders title, source, estimates and id", () => {
        expect(formatRankedIdea({ idea: IDEA, affinity: 1 / 6 }, 1).split("\n")).toEqual([
            "1. agent-kit deployment service [deploy-service]",
            "   acme/agent-kit | score 93.5 | affinity 17%",
            "   cost $100 - $500 | revenue $2,870 - $14,350/month | launch 1-3 days",
            "   id 0f8fad5b-d9cb-469f-a165-70867728950e",
        ]);
    });
});

describe("formatScore", () => {
    it("lists the score, category and signals", () => {
        const record = RepositoryRecord.parse({
            owner: "acme",
            name: "agent-kit",
            url: "https://github.com/acme/agent-kit",
        });
        const text = formatScore(record, {
            score: 93.5,
            category: "tooling",
            potential: "high",
            signals: ["monetization topics: ai"],
            breakdown: { velocity: 1, magnitude: 0.67, topics: 1, language: 1, keywords: 1 },
        });
        expect(text.split("\n")).toEqual([
            "acme/agent-kit: 93.5/100 (high)",
            "category: tooling",
            "  - monetization topics: ai",
        ]);
    });
});

describe("pool formatting", () => {
    it("renders one aligned row per idea", () => {
        expect(formatIdeaRow(IDEA)).toBe(
            "0f8fad5b-d9cb-469f-a165-70867728950e  proposed   deploy-service      agent-kit deployment service",
        );
    });

    it("renders history with the initial insert marked new", () => {
        const text = formatHistory([
            { idea_id: IDEA.idea_id, from_status: null, to_status: "proposed", note: null, changed_at: "2026-10-19T08:00:00.000Z" },
            {
                idea_id: IDEA.idea_id,
                from_status: "proposed",
                to_status: "accepted",
                note: "fits the budget",
                changed_at: "2026-10-19T09:00:00.000Z",
            },
        ]);
        expect(text.split("\n")).toEqual([
            "2026-10-19T08:00:00.000Z  (new) -> proposed",
            "2026-10-19T09:00:00.000Z  proposed -> accepted  fits the budget",
        ]);
    });

    it("renders steps with their status and log lines as they are", () => {
        const text = formatExecutionLog([
            {
                idea_id: IDEA.idea_id,
                kind: "step",
                text: "Provision a server",
                step_status: "completed",
                recorded_at: "2026-10-19T10:00:00.000Z",
            },
            {
                idea_id: IDEA.idea_id,
                kind: "log",
                text: "DNS is propagating",
                step_status: null,
                recorded_at: "2026-10-19T10:05:00.000Z",
            },
        ]);
        expect(text.split("\n")).toEqual([
            "2026-10-19T10:00:00.000Z  [completed] Provision a server",
            "2026-10-19T10:05:00.000Z  DNS is propagating",
        ]);
    });

    it("renders revenue statistics, largest source first", () => {
        const text = formatRevenueStats(
            { total: 600, count: 3, average: 200, by_source: { direct: 100, marketplace: 500 } },
            "USD",
        );
        expect(text.split("\n")).toEqual([
            "total $600 over 3 records",
            "average $200",
            "  marketplace: $500",
            "  direct: $100",
        ]);
    });

    it("renders the pool overview", () => {
        const text = formatOverview(
            {
                ideas: { total: 3, proposed: 1, accepted: 0, executing: 0, monetized: 1, rejected: 1 },
                success_rate: 0.5,
                revenue: { total: 500, count: 1, average: 500, by_source: { direct: 500 } },
                executions: { started: 2, in_progress: 0, succeeded: 1, failed: 1, steps: 4, logs: 1 },
            },
            "USD",
        );
        expect(text.split("\n")).toEqual([
            "ideas: 3",
            "  proposed  1",
            "  accepted  0",
            "  executing 0",
            "  monetized 1",
            "  rejected  1",
            "success rate: 50.0%",
            "total $500 over 1 record",
            "average $500",
            "  direct: $500",
            "executions: 2 started, 0 in progress, 1 succeeded, 1 failed",
            "  4 steps, 1 log line",
        ]);
    });
});
