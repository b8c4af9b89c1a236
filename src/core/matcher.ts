/**
 * Preference Matcher — Filters and ranks ideas against a user profile.
 *
 * Filters: terminal status (unless asked to keep them), launch cost over
 * budget, daily hours over what the user has. Ranking: affinity between the
 * idea's tags and the user's skills and interests, then revenue midpoint,
 * then age, then id. The order is total, so equal inputs rank identically.
 */
import { isTerminal } from "./lifecycle.js";
import type { Idea } from "../schemas/idea.js";
import type { UserPreferences } from "../schemas/preferences.js";
import type { MatchingConfig } from "../schemas/config.js";

export interface MatchOptions {
    /** Keep `monetized` and `rejected` ideas. Default: `config.include_terminal` */
    includeTerminal?: boolean;
    /** Truncate the ranked output. */
    limit?: number;
}

export interface RankedIdea {
    idea: Idea;
    /** Tag overlap with the user's profile, in [0, 1]. */
    affinity: number;
}

function normalizeTags(tags: Iterable<string>): Set<string> {
    const normalized = new Set<string>();
    for (const tag of tags) {
        const value = tag.trim().toLowerCase();
        if (value) normalized.add(value);
    }
    return normalized;
}

function midpoint(range: { min: number; max: number }): number {
    return (range.min + range.max) / 2;
}

/** Overlap coefficient |A ∩ B| / min(|A|, |B|); 0 when either side is empty. */
export function affinityScore(ideaTags: Iterable<string>, preferenceTags: Iterable<string>): number {
    const a = normalizeTags(ideaTags);
    const b = normalizeTags(preferenceTags);
    if (a.size === 0 || b.size === 0) return 0;

    let shared = 0;
    for (const tag of a) {
        if (b.has(tag)) shared++;
    }
    return shared / Math.min(a.size, b.size);
}

function compareRanked(x: RankedIdea, y: RankedIdea): number {
    if (x.affinity !== y.affinity) return y.affinity - x.affinity;

    const revenueX = midpoint(x.idea.monthly_revenue);
    const revenueY = midpoint(y.idea.monthly_revenue);
    if (revenueX !== revenueY) return revenueY - revenueX;

    if (x.idea.created_at !== y.idea.created_at) {
        return x.idea.created_at < y.idea.created_at ? -1 : 1;
    }
    if (x.idea.idea_id !== y.idea.idea_id) {
        return x.idea.idea_id < y.idea.idea_id ? -1 : 1;
    }
    return 0;
}

export class PreferenceMatcher {
    private readonly config: MatchingConfig;

    constructor(config: MatchingConfig) {
        this.config = config;
    }

    match(ideas: readonly Idea[], prefs: UserPreferences, options: MatchOptions = {}): Idea[] {
        return this.rank(ideas, prefs, options).map((ranked) => ranked.idea);
    }

    /** Same order as `match`, with each idea's affinity attached. */
    rank(ideas: readonly Idea[], prefs: UserPreferences, options: MatchOptions = {}): RankedIdea[] {
        const includeTerminal = options.includeTerminal ?? this.config.include_terminal;
        const preferenceTags = [...prefs.skills, ...prefs.interests];

        const ranked = ideas
            .filter((idea) => includeTerminal || !isTerminal(idea.status))
            .filter((idea) => idea.launch_cost.min <= prefs.budget)
            .filter((idea) => this.requiredHoursPerDay(idea) <= prefs.available_hours_per_day)
            .map((idea) => ({
                idea,
                affinity: affinityScore([...idea.tags, ...idea.target_users], preferenceTags),
            }))
            .sort(compareRanked);

        return options.limit === undefined ? ranked : ranked.slice(0, Math.max(0, options.limit));
    }

    /**
     * Hours per day the idea demands while launching: the pathway's total
     * effort spread over the fastest launch time. Launches shorter than a
     * day put all of the effort into one day.
     */
    requiredHoursPerDay(idea: Idea): number {
        const effort = this.config.effort_hours[idea.pathway] ?? 0;
        return effort / Math.max(1, idea.time_to_launch_days.min);
    }
}
