/**
 * GitHub Source Tests — Request shape, filtering, retries and error mapping,
 * against a stubbed fetch.
 */
import { describe, it, expect, vi } from "vitest";
import { GitHubSource, isTransientError, windowStart } from "../github.js";
import { SourceConfig } from "../../schemas/config.js";
import type { SourceConfigInput } from "../../schemas/config.js";
import { FetchError } from "../../errors/index.js";
import { TimeoutError } from "../../utils/retry.js";

const NOW = new Date("2026-10-19T00:00:00.000Z");

function repo(fullName: string, stars: number, description: string | null = null) {
    const [owner = "", name = ""] = fullName.split("/");
    return {
        name,
        full_name: fullName,
        owner: { login: owner },
        description,
        language: "TypeScript",
        stargazers_count: stars,
        topics: ["ai"],
        html_url: `https://github.com/${fullName}`,
    };
}

function json(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function queryOf(input: string | URL | Request): string {
    const url = new URL(typeof input === "string" || input instanceof URL ? input : input.url);
    return url.searchParams.get("q") ?? "";
}

function createSource(overrides: SourceConfigInput = {}, token?: string) {
    const fetchMock = vi.fn<typeof fetch>();
    const source = new GitHubSource({
        config: SourceConfig.parse({
            queries: ["AI agent"],
            retry_initial_delay_ms: 0,
            max_retries: 2,
            ...overrides,
        }),
        token,
        fetch: fetchMock,
        now: () => NOW,
    });
    return { source, fetchMock };
}

describe("windowStart", () => {
    it("formats the start of the window as a date", () => {
        expect(windowStart(NOW, 7)).toBe("2026-10-12");
        expect(windowStart(NOW, 1)).toBe("2026-10-18");
    });
});

describe("isTransientError", () => {
    it("retries rate limits, server errors, timeouts and network failures", () => {
        expect(isTransientError(new FetchError("x", { status: 429 }))).toBe(true);
        expect(isTransientError(new FetchError("x", { status: 502 }))).toBe(true);
        expect(isTransientError(new TimeoutError("slow", 10))).toBe(true);
        expect(isTransientError(new TypeError("fetch failed"))).toBe(true);
    });

    it("does not retry client errors", () => {
        expect(isTransientError(new FetchError("x", { status: 401 }))).toBe(false);
        expect(isTransientError(new FetchError("x"))).toBe(false);
        expect(isTransientError(new Error("other"))).toBe(false);
    });
});

describe("GitHubSource.fetchTrending", () => {
    it("searches recent repositories created inside the window", async () => {
        const { source, fetchMock } = createSource({ min_stars: 50, per_page: 30 }, "test-secret");
        fetchMock.mockImplementation(async () => json({ items: [] }));

        await source.fetchTrending({ window: "weekly", limit: 10 });

        expect(fetchMock).toHaveBeenCalledTimes(1);
        const [input, init] = fetchMock.mock.calls[0] ?? [];
        expect(input).toBeDefined();
        if (input === undefined) return;
        const url = new URL(typeof input === "string" || input instanceof URL ? input : input.url);
        expect(url.origin + url.pathname).toBe("https://api.github.com/search/repositories");
        expect(url.searchParams.get("q")).toBe("AI agent created:>2026-10-12 stars:>50");
        expect(url.searchParams.get("sort")).toBe("stars");
        expect(url.searchParams.get("order")).toBe("desc");
        expect(url.searchParams.get("per_page")).toBe("30");
        expect(init?.headers).toMatchObject({
            Accept: "application/vnd.github+json",
            Authorization: "Bearer test-secret",
        });
    });

    it("omits the authorization header without a token", async () => {
        const { source, fetchMock } = createSource();
        fetchMock.mockImplementation(async () => json({ items: [] }));
        await source.fetchTrending({ window: "daily", limit: 10 });
        expect(fetchMock.mock.calls[0]?.[1]?.headers).not.toHaveProperty("Authorization");
    });

    it("merges queries, drops excluded names, de-duplicates and sorts by stars", async () => {
        const { source, fetchMock } = createSource({ queries: ["AI agent", "LLM tools"] });
        fetchMock.mockImplementation(async (input) =>
            queryOf(input).startsWith("AI agent")
                ? json({
                    items: [
                        repo("acme/agent-kit", 500, "An autonomous coding agent"),
                        repo("someone/awesome-llm", 9000, "A curated list"),
                    ],
                })
                : json({
                    items: [
                        repo("beta/tiny", 80, "Tiny LLM tools"),
                        repo("Acme/Agent-Kit", 500, "An autonomous coding agent"),
                        repo("edu/llm-school", 3000, "A free course on LLMs"),
                    ],
                }),
        );

        const records = await source.fetchTrending({ window: "weekly", limit: 10 });

        expect(records.map((r) => `${r.owner}/${r.name}`)).toEqual(["acme/agent-kit", "beta/tiny"]);
        expect(records[0]).toEqual({
            owner: "acme",
            name: "agent-kit",
            description: "An autonomous coding agent",
            language: "TypeScript",
            stars: 500,
            star_growth: 500,
            topics: ["ai"],
            url: "https://github.com/acme/agent-kit",
        });
    });

    it("truncates to the requested limit", async () => {
        const { source, fetchMock } = createSource();
        fetchMock.mockImplementation(async () =>
            json({ items: [repo("a/one", 300), repo("b/two", 200), repo("c/three", 100)] }),
        );
        const records = await source.fetchTrending({ window: "weekly", limit: 2 });
        expect(records.map((r) => r.name)).toEqual(["one", "two"]);
    });

    it("retries a server error and then succeeds", async () => {
        const { source, fetchMock } = createSource();
        fetchMock
            .mockImplementationOnce(async () => json({ message: "unavailable" }, 503))
            .mockImplementationOnce(async () => json({ items: [repo("acme/agent-kit", 500)] }));

        const records = await source.fetchTrending({ window: "weekly", limit: 10 });
        expect(records).toHaveLength(1);
        expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it("retries a network failure", async () => {
        const { source, fetchMock } = createSource();
        fetchMock
            .mockRejectedValueOnce(new TypeError("fetch failed"))
            .mockImplementationOnce(async () => json({ items: [] }));
        await expect(source.fetchTrending({ window: "weekly", limit: 10 })).resolves.toEqual([]);
        expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it("fails with FetchError after exhausting retries", async () => {
        const { source, fetchMock } = createSource();
        fetchMock.mockImplementation(async () => json({ message: "boom" }, 500));

        const error = await source.fetchTrending({ window: "weekly", limit: 10 }).catch((e: unknown) => e);
        expect(error).toBeInstanceOf(FetchError);
        if (error instanceof FetchError) expect(error.status).toBe(500);
        expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    it("does not retry an authentication failure", async () => {
        const { source, fetchMock } = createSource();
        fetchMock.mockImplementation(async () => json({ message: "Bad credentials" }, 401));

        await expect(source.fetchTrending({ window: "weekly", limit: 10 })).rejects.toThrow(FetchError);
        expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it("rejects an unexpected payload", async () => {
        const { source, fetchMock } = createSource();
        fetchMock.mockImplementation(async () => json({ total_count: 3 }));
        await expect(source.fetchTrending({ window: "weekly", limit: 10 })).rejects.toThrow(
            'Fetch failed: unexpected search payload for query "AI agent"',
        );
    });
});

describe("GitHubSource.fetchRepository", () => {
    it("fetches one repository with zero window growth", async () => {
        const { source, fetchMock } = createSource();
        fetchMock.mockImplementation(async () => json(repo("acme/agent-kit", 500, "An autonomous coding agent")));

        const record = await source.fetchRepository("acme", "agent-kit");

        expect(String(fetchMock.mock.calls[0]?.[0])).toBe("https://api.github.com/repos/acme/agent-kit");
        expect(record.stars).toBe(500);
        expect(record.star_growth).toBe(0);
        expect(record.owner).toBe("acme");
    });

    it("maps a missing repository to FetchError with status 404", async () => {
        const { source, fetchMock } = createSource();
        fetchMock.mockImplementation(async () => json({ message: "Not Found" }, 404));

        const error = await source.fetchRepository("acme", "missing").catch((e: unknown) => e);
        expect(error).toBeInstanceOf(FetchError);
        if (error instanceof FetchError) expect(error.status).toBe(404);
    });
});
