/**
 * Idea lifecycle — the status state machine.
 *
 *   proposed -> accepted -> executing -> monetized
 *   proposed | accepted | executing -> rejected
 *
 * No state may be skipped; `monetized` and `rejected` are terminal.
 */
import { InvalidTransitionError } from "../errors/index.js";
import type { IdeaStatus } from "../schemas/idea.js";

export const STATUS_TRANSITIONS: Readonly<Record<IdeaStatus, readonly IdeaStatus[]>> = {
    proposed: ["accepted", "rejected"],
    accepted: ["executing", "rejected"],
    executing: ["monetized", "rejected"],
    monetized: [],
    rejected: [],
};

export const TERMINAL_STATUSES: readonly IdeaStatus[] = ["monetized", "rejected"];

export function isTerminal(status: IdeaStatus): boolean {
    return STATUS_TRANSITIONS[status].length === 0;
}

export function canTransition(from: IdeaStatus, to: IdeaStatus): boolean {
    return STATUS_TRANSITIONS[from].includes(to);
}

/** @throws InvalidTransitionError when `from -> to` is not an edge of the graph */
export function assertTransition(ideaId: string, from: IdeaStatus, to: IdeaStatus): void {
    if (!canTransition(from, to)) {
        throw new InvalidTransitionError(ideaId, from, to);
    }
}
