export { runWalkthrough, display } from "./walkthrough.js";
export type { WalkthroughOptions, WalkthroughSummary } from "./walkthrough.js";
