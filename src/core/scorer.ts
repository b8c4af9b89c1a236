/**
 * Scorer — Turns a RepositoryRecord into a monetization-potential score.
 *
 * The score is a weighted mean of five signals, each clamped before
 * weighting:
 *   - velocity: stars gained over the window, against a saturation point
 *   - magnitude: log-scaled absolute stars, so mega-projects do not dominate
 *   - topics: monetization-friendly topic tags
 *   - language: per-language popularity weight
 *   - keywords: monetization keywords found in the description
 *
 * The category is the signal group (topics + keywords per category) with the
 * strongest weighted contribution. Pure and synchronous: the same record
 * always yields the same result.
 */
import { CATEGORY_PRIORITY } from "../schemas/score.js";
import type { Category, Potential, ScoreResult, SignalBreakdown } from "../schemas/score.js";
import type { RepositoryRecord } from "../schemas/repository.js";
import type { ScoringConfig } from "../schemas/config.js";

interface CompiledGroup {
    category: Category;
    topics: ReadonlySet<string>;
    phrases: readonly string[];
}

/**
 * Lower-case `text`, split it on anything that is not a letter or digit and
 * pad it with spaces, so phrases can be matched on word boundaries.
 */
export function toPhraseText(text: string): string {
    const words = text.toLowerCase().split(/[^\p{L}\p{N}+#]+/u).filter(Boolean);
    return ` ${words.join(" ")} `;
}

/** Normalize a configured keyword the same way `toPhraseText` normalizes text. */
function toPhrase(keyword: string): string {
    return toPhraseText(keyword).trim();
}

function clampTo(value: number, bounds: { min: number; max: number }): number {
    if (!Number.isFinite(value)) return bounds.min;
    return Math.min(bounds.max, Math.max(bounds.min, value));
}

function round(value: number, digits: number): number {
    const factor = 10 ** digits;
    return Math.round(value * factor) / factor;
}

export class Scorer {
    private readonly config: ScoringConfig;
    private readonly groups: CompiledGroup[];
    private readonly topicVocabulary: ReadonlySet<string>;
    private readonly phraseVocabulary: readonly string[];
    private readonly languageWeights: ReadonlyMap<string, number>;

    constructor(config: ScoringConfig) {
        this.config = config;
        this.groups = CATEGORY_PRIORITY.map((category) => {
            const group = config.signal_groups[category];
            return {
                category,
                topics: new Set(group.topics),
                phrases: [...new Set(group.keywords.map(toPhrase).filter(Boolean))],
            };
        });
        this.topicVocabulary = new Set(this.groups.flatMap((g) => [...g.topics]));
        this.phraseVocabulary = [...new Set(this.groups.flatMap((g) => g.phrases))];
        this.languageWeights = new Map(
            Object.entries(config.language_weights).map(([language, weight]) => [language.toLowerCase(), weight]),
        );
    }

    score(record: RepositoryRecord): ScoreResult {
        const { weights, clamp } = this.config;
        const text = toPhraseText(record.description);

        const topicHits = record.topics.filter((topic) => this.topicVocabulary.has(topic));
        const keywordHits = this.phraseVocabulary.filter((phrase) => text.includes(` ${phrase} `));
        const languageWeight = this.languageWeight(record.language);

        const breakdown: SignalBreakdown = {
            velocity: clampTo(record.star_growth / this.config.velocity_saturation, clamp),
            magnitude: clampTo(
                Math.log10(record.stars + 1) / Math.log10(this.config.magnitude_saturation + 1),
                clamp,
            ),
            topics: clampTo(topicHits.length / this.config.topic_saturation, clamp),
            language: clampTo(languageWeight, clamp),
            keywords: clampTo(keywordHits.length / this.config.keyword_saturation, clamp),
        };

        const totalWeight =
            weights.velocity + weights.magnitude + weights.topics + weights.language + weights.keywords;
        const weighted =
            weights.velocity * breakdown.velocity +
            weights.magnitude * breakdown.magnitude +
            weights.topics * breakdown.topics +
            weights.language * breakdown.language +
            weights.keywords * breakdown.keywords;
        const score = round((100 * weighted) / totalWeight, 1);

        const category = this.pickCategory(record.topics, text);

        const signals: string[] = [];
        if (record.star_growth > 0) {
            signals.push(`+${record.star_growth} stars over the window (velocity ${breakdown.velocity.toFixed(2)})`);
        }
        if (record.stars > 0) {
            signals.push(`${record.stars} stars (magnitude ${breakdown.magnitude.toFixed(2)})`);
        }
        if (topicHits.length > 0) {
            signals.push(`monetization topics: ${topicHits.join(", ")}`);
        }
        if (record.language && languageWeight > 0) {
            signals.push(`language ${record.language} (weight ${languageWeight.toFixed(2)})`);
        }
        if (keywordHits.length > 0) {
            signals.push(`description keywords: ${keywordHits.join(", ")}`);
        }
        if (category) {
            signals.push(`category ${category} from the strongest signal group`);
        }

        return {
            score,
            category,
            potential: this.potential(score),
            signals,
            breakdown,
        };
    }

    private languageWeight(language: string | null): number {
        if (!language) return 0;
        return this.languageWeights.get(language.toLowerCase()) ?? this.config.default_language_weight;
    }

    /**
     * Strongest group wins; on a tie the earlier entry of CATEGORY_PRIORITY
     * is kept because later groups must be strictly stronger to replace it.
     */
    private pickCategory(topics: readonly string[], text: string): Category | null {
        const { weights, clamp } = this.config;
        let best: Category | null = null;
        let bestStrength = 0;

        for (const group of this.groups) {
            const topicHits = topics.filter((topic) => group.topics.has(topic)).length;
            const phraseHits = group.phrases.filter((phrase) => text.includes(` ${phrase} `)).length;
            if (topicHits === 0 && phraseHits === 0) continue;

            const strength =
                weights.topics * clampTo(topicHits / this.config.topic_saturation, clamp) +
                weights.keywords * clampTo(phraseHits / this.config.keyword_saturation, clamp);
            if (best === null || strength > bestStrength) {
                best = group.category;
                bestStrength = strength;
            }
        }
        return best;
    }

    private potential(score: number): Potential {
        const { thresholds } = this.config;
        if (score >= thresholds.high) return "high";
        if (score >= thresholds.medium) return "medium";
        return "low";
    }
}
