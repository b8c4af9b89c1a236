export { GitHubSource, isTransientError, windowStart } from "./github.js";
export type { GitHubSourceOptions } from "./github.js";
export { WINDOW_DAYS } from "./types.js";
export type { TrendingRequest, TrendingSource } from "./types.js";
