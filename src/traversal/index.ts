export { walkDirectory, processFile } from "./walker.js";
export type { WalkOptions, TraversalPolicy, TraversalIssue } from "./walker.js";
