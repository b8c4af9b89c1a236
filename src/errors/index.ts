/**
 * Custom Error Classes — One class per failure the pipeline distinguishes.
 *
 * Only `FetchError` aborts a run. Duplicates and malformed records are
 * reported and skipped; status-update misuse surfaces to whoever called the
 * update.
 */
import type { IdeaStatus } from "../schemas/idea.js";

/**
 * Thrown when the trending source cannot deliver a batch. Covers auth,
 * rate-limit, network and parse failures alike; the run yields no partial
 * results.
 */
export class FetchError extends Error {
    /** HTTP status of the failing response, when there was one. */
    public readonly status: number | null;

    constructor(message: string, options?: { cause?: unknown; status?: number }) {
        super(`Fetch failed: ${message}`, { cause: options?.cause });
        this.name = "FetchError";
        this.status = options?.status ?? null;
    }
}

/**
 * Thrown by the asset pool when a live (non-rejected) idea with the same
 * `idea_id` already exists.
 */
export class DuplicateIdeaError extends Error {
    public readonly ideaId: string;

    constructor(ideaId: string) {
        super(`Duplicate idea: "${ideaId}" is already in the pool.`);
        this.name = "DuplicateIdeaError";
        this.ideaId = ideaId;
    }
}

export class NotFoundError extends Error {
    public readonly ideaId: string;

    constructor(ideaId: string) {
        super(`Idea not found: "${ideaId}".`);
        this.name = "NotFoundError";
        this.ideaId = ideaId;
    }
}

/**
 * Thrown when a status change is not an edge of the lifecycle graph,
 * including any move out of a terminal state.
 */
export class InvalidTransitionError extends Error {
    public readonly ideaId: string;
    public readonly from: IdeaStatus;
    public readonly to: IdeaStatus;

    constructor(ideaId: string, from: IdeaStatus, to: IdeaStatus) {
        super(`Invalid transition for idea "${ideaId}": ${from} -> ${to}.`);
        this.name = "InvalidTransitionError";
        this.ideaId = ideaId;
        this.from = from;
        this.to = to;
    }
}

/** Thrown when revenue is recorded against an idea that is not monetized. */
export class InvalidRevenueError extends Error {
    public readonly ideaId: string;
    public readonly status: IdeaStatus;

    constructor(ideaId: string, status: IdeaStatus) {
        super(`Cannot record revenue for idea "${ideaId}" in status "${status}"; it must be monetized first.`);
        this.name = "InvalidRevenueError";
        this.ideaId = ideaId;
        this.status = status;
    }
}

/**
 * Thrown when execution steps or logs are added to an idea that is not
 * being worked on (`accepted` or `executing`).
 */
export class InvalidExecutionError extends Error {
    public readonly ideaId: string;
    public readonly status: IdeaStatus;

    constructor(ideaId: string, status: IdeaStatus) {
        super(`Cannot track execution for idea "${ideaId}" in status "${status}"; it must be accepted or executing.`);
        this.name = "InvalidExecutionError";
        this.ideaId = ideaId;
        this.status = status;
    }
}

/**
 * A fetched record that fails validation. The pipeline skips it and
 * continues with the rest of the batch.
 */
export class ValidationError extends Error {
    public readonly issues: string[];
    public readonly input: unknown;

    constructor(issues: string[], input?: unknown) {
        super(`Invalid repository record: ${issues.join("; ")}`);
        this.name = "ValidationError";
        this.issues = issues;
        this.input = input;
    }
}

/** Thrown when a configuration or preferences file cannot be used. */
export class ConfigError extends Error {
    public readonly path: string;
    public readonly issues: string[];

    constructor(path: string, issues: string[]) {
        super(`Invalid configuration in ${path}: ${issues.join("; ")}`);
        this.name = "ConfigError";
        this.path = path;
        this.issues = issues;
    }
}
