/** Default ceiling on model calls per run. */
export const DEFAULT_MAX_TURNS = 10;

/** Hand-offs are exposed to the model as function tools named `transfer_to_<agent>`. */
export const HANDOFF_TOOL_PREFIX = "transfer_to_";

export const DEFAULT_TRACE_NAME = "Agent workflow";
