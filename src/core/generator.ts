/**
 * Idea Generator — Expands a scored repository into concrete ideas, one per
 * monetization pathway the category's affinity row marks as applicable.
 *
 * Estimates come from the pathway's template. Revenue is scaled by the
 * potential score; cost and time are copied as-is.
 */
import { ideaId } from "./identity.js";
import type { Idea, Pathway, EstimateRange } from "../schemas/idea.js";
import type { RepositoryRecord } from "../schemas/repository.js";
import type { ScoreResult } from "../schemas/score.js";
import type { GenerationConfig } from "../schemas/config.js";

export interface IdeaGeneratorOptions {
    /** Clock used for `created_at`. Default: `() => new Date()` */
    now?: () => Date;
}

function fill(template: string, project: string): string {
    return template.replaceAll("{project}", project);
}

export class IdeaGenerator {
    private readonly config: GenerationConfig;
    private readonly now: () => Date;

    constructor(config: GenerationConfig, options: IdeaGeneratorOptions = {}) {
        this.config = config;
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Returns 0–4 ideas. A record without a category (no signal group fired)
     * or with a category missing from the affinity table yields `[]`.
     */
    generate(record: RepositoryRecord, score: ScoreResult): Idea[] {
        if (score.category === null) return [];
        const pathways: readonly Pathway[] = this.config.affinity[score.category] ?? [];
        if (pathways.length === 0) return [];

        const createdAt = this.now().toISOString();
        return pathways.map((pathway) => this.buildIdea(record, score, pathway, createdAt));
    }

    /**
     * Multiplier applied to template revenue: `low` anchor at score 0, `high`
     * anchor at score 100, linear in between.
     */
    revenueFactor(score: number): number {
        const { low, high } = this.config.revenue_anchors;
        const t = Math.min(100, Math.max(0, score)) / 100;
        return low + (high - low) * t;
    }

    private buildIdea(record: RepositoryRecord, score: ScoreResult, pathway: Pathway, createdAt: string): Idea {
        const template = this.config.templates[pathway];
        const factor = this.revenueFactor(score.score);
        const tags = [...record.topics];
        if (record.language) tags.push(record.language.toLowerCase());

        return {
            idea_id: ideaId(record.owner, record.name, pathway),
            title: fill(template.title, record.name),
            description: fill(template.description, record.name),
            target_users: [...template.audience],
            tags: [...new Set(tags)],
            pathway,
            launch_cost: copyRange(template.cost),
            monthly_revenue: {
                min: Math.round(template.revenue.min * factor),
                max: Math.round(template.revenue.max * factor),
            },
            time_to_launch_days: copyRange(template.time_days),
            currency: this.config.currency,
            potential_score: score.score,
            source_full_name: record.full_name,
            source_url: record.url,
            created_at: createdAt,
            status: "proposed",
            realized_revenue: [],
        };
    }
}

function copyRange(range: EstimateRange): EstimateRange {
    return { min: range.min, max: range.max };
}
