export { loadEnvConfig, loggerConfigFor, parseVariableAssignments } from "./config.js";
export { formatGenerateSummary, formatTriggerSnippet, type GenerateSummaryInput } from "./summary.js";
