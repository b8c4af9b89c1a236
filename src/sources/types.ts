/**
 * Trending source contract — the only suspending step of a pipeline run.
 */
import type { RepositoryRecordInput } from "../schemas/repository.js";
import type { TrendingWindow } from "../schemas/config.js";

export interface TrendingRequest {
    window: TrendingWindow;
    /** Maximum records returned. */
    limit: number;
    /** Caller cancellation; the source aborts outstanding requests. */
    signal?: AbortSignal;
}

/**
 * Anything that can list trending repositories. Implementations fail with a
 * single `FetchError` and never return partial batches. Records are returned
 * unvalidated; the pipeline validates each one.
 */
export interface TrendingSource {
    fetchTrending(request: TrendingRequest): Promise<RepositoryRecordInput[]>;
}

export const WINDOW_DAYS: Readonly<Record<TrendingWindow, number>> = {
    daily: 1,
    weekly: 7,
    monthly: 30,
};
