export { computeDayAheadMatching, MATCHING_THRESHOLDS } from "./day-ahead.js";
export { computeAdvisories, type AdvisoryContext } from "./advisories.js";
export { formatStatements } from "./statements.js";
export { buildWindows, formatWindowTime, mergeFlagRuns, overlapSteps, windowLengthSteps, type FlagRun } from "./windows.js";
