/**
 * trendmint — Public API
 *
 * Scores trending repositories, expands them into monetization ideas, keeps
 * those ideas in a persistent pool and ranks them against a user's profile.
 */

// Pipeline
export { runPipeline, analyzeRepository, createComponents, parseRepository } from "./orchestrator.js";
export type {
    PipelineStage,
    PipelineComponents,
    PipelineOptions,
    PipelineResult,
    ScoredRepository,
    AnalysisResult,
} from "./orchestrator.js";

// Core
export {
    Scorer,
    IdeaGenerator,
    PreferenceMatcher,
    affinityScore,
    ideaId,
    IDEA_ID_NAMESPACE,
    STATUS_TRANSITIONS,
    TERMINAL_STATUSES,
    isTerminal,
    canTransition,
    assertTransition,
} from "./core/index.js";
export type { IdeaGeneratorOptions, MatchOptions, RankedIdea } from "./core/index.js";

// Schemas
export {
    // Repositories
    RepositoryRecord,
    TopicTag,
    // Scoring
    Category,
    CATEGORY_PRIORITY,
    Potential,
    ScoreResult,
    SignalBreakdown,
    // Ideas
    Pathway,
    IdeaStatus,
    EstimateRange,
    RevenueRecord,
    RevenueInput,
    Idea,
    StatusChange,
    ExecutionStepStatus,
    ExecutionEntry,
    // Preferences
    UserPreferences,
    // Config
    AppConfig,
    loadConfig,
} from "./schemas/index.js";
export type { RepositoryRecordInput, AppConfigInput } from "./schemas/index.js";

// Memory
export { AssetPool, SqliteDatabase } from "./memory/index.js";
export type { IdeaFilter, StatusUpdateOptions, RevenueStats, ExecutionStats, PoolOverview } from "./memory/index.js";

// Sources
export { GitHubSource, WINDOW_DAYS } from "./sources/index.js";
export type { TrendingRequest, TrendingSource, GitHubSourceOptions } from "./sources/index.js";

// Errors
export {
    FetchError,
    DuplicateIdeaError,
    NotFoundError,
    InvalidTransitionError,
    InvalidRevenueError,
    InvalidExecutionError,
    ValidationError,
    ConfigError,
} from "./errors/index.js";
