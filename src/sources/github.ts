/**
 * GitHub source — Finds recently created, fast-growing repositories through
 * the GitHub repository search API.
 *
 * One search runs per configured query (bounded by `concurrency`). Results are
 * merged, de-duplicated by full name, filtered against the exclude list and
 * cut to the requested limit. Every repository returned was created inside
 * the window, so all of its stars count as window growth.
 */
import pLimit from "p-limit";
import { z } from "zod/v4";
import { FetchError } from "../errors/index.js";
import { withRetry, withTimeout, TimeoutError } from "../utils/retry.js";
import { WINDOW_DAYS } from "./types.js";
import type { TrendingRequest, TrendingSource } from "./types.js";
import type { SourceConfig } from "../schemas/config.js";
import type { RepositoryRecordInput } from "../schemas/repository.js";

/** The subset of GitHub's repository payload this source reads. */
const GitHubRepository = z.object({
    name: z.string().nullish(),
    full_name: z.string().nullish(),
    owner: z.object({ login: z.string() }).nullish(),
    description: z.string().nullish(),
    language: z.string().nullish(),
    stargazers_count: z.number().nullish(),
    topics: z.array(z.string()).nullish(),
    html_url: z.string().nullish(),
});
type GitHubRepository = z.infer<typeof GitHubRepository>;

const GitHubSearchResponse = z.object({
    items: z.array(GitHubRepository),
});

export interface GitHubSourceOptions {
    config: SourceConfig;
    /** Personal access token; raises the search rate limit. */
    token?: string;
    /** Injected for tests. Default: global `fetch`. */
    fetch?: typeof fetch;
    /** Clock used to compute the `created:>` bound. */
    now?: () => Date;
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/** Rate limits, server errors, timeouts and network failures are worth a retry. */
export function isTransientError(error: unknown): boolean {
    if (error instanceof FetchError) {
        return error.status === 429 || (error.status !== null && error.status >= 500);
    }
    return error instanceof TimeoutError || error instanceof TypeError;
}

/** "2026-10-12" for a 7-day window ending 2026-10-19. */
export function windowStart(now: Date, days: number): string {
    const start = new Date(now.getTime() - days * 24 * 60 * 60 * 1000);
    return start.toISOString().slice(0, 10);
}

function toRecordInput(repo: GitHubRepository, starGrowth: number | "all"): RepositoryRecordInput {
    const [ownerFromName = "", nameFromFullName = ""] = (repo.full_name ?? "").split("/");
    const stars = repo.stargazers_count ?? 0;
    return {
        owner: repo.owner?.login ?? ownerFromName,
        name: repo.name ?? nameFromFullName,
        description: repo.description ?? null,
        language: repo.language ?? null,
        stars,
        star_growth: starGrowth === "all" ? stars : starGrowth,
        topics: repo.topics ?? [],
        url: repo.html_url ?? "",
    };
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export class GitHubSource implements TrendingSource {
    private readonly config: SourceConfig;
    private readonly token: string | undefined;
    private readonly fetchImpl: typeof fetch;
    private readonly now: () => Date;
    private readonly onRetry: GitHubSourceOptions["onRetry"];

    constructor(options: GitHubSourceOptions) {
        this.config = options.config;
        this.token = options.token || undefined;
        this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
        this.now = options.now ?? (() => new Date());
        this.onRetry = options.onRetry;
    }

    async fetchTrending(request: TrendingRequest): Promise<RepositoryRecordInput[]> {
        const since = windowStart(this.now(), WINDOW_DAYS[request.window]);
        const limit = pLimit(this.config.concurrency);

        let batches: GitHubRepository[][];
        try {
            batches = await Promise.all(
                this.config.queries.map((query) => limit(() => this.search(query, since, request.signal))),
            );
        } catch (error) {
            limit.clearQueue();
            throw error instanceof FetchError ? error : new FetchError(describe(error), { cause: error });
        }

        const seen = new Set<string>();
        const repositories = batches
            .flat()
            .filter((repo) => !this.isExcluded(repo))
            .sort((a, b) => (b.stargazers_count ?? 0) - (a.stargazers_count ?? 0))
            .filter((repo) => {
                const key = (repo.full_name ?? `${repo.owner?.login ?? ""}/${repo.name ?? ""}`).toLowerCase();
                if (seen.has(key)) return false;
                seen.add(key);
                return true;
            });

        return repositories.slice(0, request.limit).map((repo) => toRecordInput(repo, "all"));
    }

    /**
     * Fetch a single repository. Star growth is unknown outside a search
     * window and reported as 0.
     */
    async fetchRepository(owner: string, name: string, signal?: AbortSignal): Promise<RepositoryRecordInput> {
        const url = `${this.config.api_url}/repos/${encodeURIComponent(owner)}/${encodeURIComponent(name)}`;
        try {
            const body = await this.request(url, signal);
            const parsed = GitHubRepository.safeParse(body);
            if (!parsed.success) {
                throw new FetchError(`unexpected repository payload from ${url}`);
            }
            return toRecordInput(parsed.data, 0);
        } catch (error) {
            throw error instanceof FetchError ? error : new FetchError(describe(error), { cause: error });
        }
    }

    private async search(query: string, since: string, signal?: AbortSignal): Promise<GitHubRepository[]> {
        const q = `${query} created:>${since} stars:>${this.config.min_stars}`;
        const params = new URLSearchParams({
            q,
            sort: "stars",
            order: "desc",
            per_page: String(this.config.per_page),
        });
        const url = `${this.config.api_url}/search/repositories?${params.toString()}`;

        const body = await this.request(url, signal);
        const parsed = GitHubSearchResponse.safeParse(body);
        if (!parsed.success) {
            throw new FetchError(`unexpected search payload for query "${query}"`);
        }
        return parsed.data.items;
    }

    private async request(url: string, signal?: AbortSignal): Promise<unknown> {
        return withRetry(
            () =>
                withTimeout(
                    async (timeoutSignal) => {
                        const response = await this.fetchImpl(url, { headers: this.headers(), signal: timeoutSignal });
                        if (!response.ok) {
                            throw new FetchError(`GitHub API responded ${response.status} for ${url}`, {
                                status: response.status,
                            });
                        }
                        return response.json();
                    },
                    this.config.timeout_ms,
                    { message: `GitHub request timed out after ${this.config.timeout_ms}ms`, signal },
                ),
            {
                maxRetries: this.config.max_retries,
                initialDelay: this.config.retry_initial_delay_ms,
                retryIf: (error) => !signal?.aborted && isTransientError(error),
                onRetry: this.onRetry,
            },
        );
    }

    private headers(): Record<string, string> {
        const headers: Record<string, string> = {
            Accept: "application/vnd.github+json",
            "User-Agent": "trendmint",
            "X-GitHub-Api-Version": "2022-11-28",
        };
        if (this.token) {
            headers["Authorization"] = `Bearer ${this.token}`;
        }
        return headers;
    }

    private isExcluded(repo: GitHubRepository): boolean {
        const text = `${repo.full_name ?? repo.name ?? ""} ${repo.description ?? ""}`.toLowerCase();
        return this.config.exclude_keywords.some((keyword) => keyword && text.includes(keyword));
    }
}
