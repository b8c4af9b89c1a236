export { initCommand } from "./init.js";
export { runCommand } from "./run.js";
export { analyzeCommand } from "./analyze.js";
export {
    poolListCommand,
    poolStatusCommand,
    poolRevenueCommand,
    poolStepCommand,
    poolLogCommand,
    poolHistoryCommand,
    poolOverviewCommand,
} from "./pool.js";
