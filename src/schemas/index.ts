/**
 * Schema barrel export — all Zod schemas and inferred types.
 */

// Repositories
export { RepositoryRecord, TopicTag } from "./repository.js";
export type { RepositoryRecordInput } from "./repository.js";

// Scoring
export { Category, CATEGORY_PRIORITY, SignalName, Potential, SignalBreakdown, ScoreResult } from "./score.js";

// Ideas
export {
    Pathway,
    IdeaStatus,
    EstimateRange,
    RevenueRecord,
    RevenueInput,
    Idea,
    StatusChange,
    ExecutionStepStatus,
    ExecutionEntry,
} from "./idea.js";

// Preferences
export { UserPreferences } from "./preferences.js";

// Configuration
export {
    AppConfig,
    ScoringConfig,
    SignalWeights,
    SignalGroup,
    GenerationConfig,
    PathwayTemplate,
    MatchingConfig,
    SourceConfig,
    TrendingWindow,
    PoolConfig,
    loadConfig,
} from "./config.js";
export type { AppConfigInput, SourceConfigInput } from "./config.js";
