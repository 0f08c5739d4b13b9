/**
 * Constants
 */

export { PIPELINE_DEFAULTS, RESERVED_TOP_LEVEL_KEYS } from "./pipeline.js";
