/**
 * Structured conversation extractor and built-in agents.
 */

export {
	ConfigError,
	ExtractionUnavailableError,
	IntakeError,
	SchemaDefinitionError,
	SessionClosedError,
	TurnInProgressError,
} from "./src/core/conversation/errors.js";
export {
	type Candidate,
	applyDefaults,
	defineSchema,
	fieldLabel,
	normalizeCandidate,
	schemaParameters,
	validate,
} from "./src/core/conversation/schema.js";
export { ConversationSession, mergeCandidate, startSession } from "./src/core/conversation/session.js";
export type * from "./src/core/conversation/types.js";
export {
	DEFAULT_CANCEL_COMMANDS,
	DEFAULT_MAX_FAILURES,
	DEFAULT_MAX_TURNS,
	DEFAULT_TIMEOUT_MS,
} from "./src/core/conversation/types.js";
export { LlmExtractor, type LlmExtractorOptions, resolveModel } from "./src/core/extraction/llm.js";
export { withTimeout } from "./src/core/extraction/timeout.js";
export { createBuiltinAgents, getAgent, listAgents, type AgentDefinition, type AgentFactory } from "./built-in-agents/index.js";
export { main, runSession } from "./src/cli/main.js";
