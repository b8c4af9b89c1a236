export { Scorer, toPhraseText } from "./scorer.js";
export { IdeaGenerator } from "./generator.js";
export type { IdeaGeneratorOptions } from "./generator.js";
export { PreferenceMatcher, affinityScore } from "./matcher.js";
export type { MatchOptions, RankedIdea } from "./matcher.js";
export { ideaId, IDEA_ID_NAMESPACE } from "./identity.js";
export { STATUS_TRANSITIONS, TERMINAL_STATUSES, isTerminal, canTransition, assertTransition } from "./lifecycle.js";
