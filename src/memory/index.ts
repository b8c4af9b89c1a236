export { SqliteDatabase, IdeaRow } from "./sqlite.js";
export type { Migration, IdeaRowFilter } from "./sqlite.js";
export { AssetPool } from "./pool.js";
export type { IdeaFilter, StatusUpdateOptions, RevenueStats, ExecutionStats, PoolOverview, AssetPoolOptions } from "./pool.js";
