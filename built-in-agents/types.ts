/**
 * Shared types for built-in agents.
 */

import type { ExtractedRecord, RecordSchema } from "../src/core/conversation/types.js";

/** Configuration for a single conversational agent */
export interface AgentDefinition {
	name: string;
	description: string;
	schema: RecordSchema;
	/** System prompt for the language-model extractor */
	systemPrompt: string;
	/** First question shown when a session starts */
	openingPrompt: string;
	/** Render a completed, defaulted record for display */
	present(record: ExtractedRecord): string;
}

/** Factory function that produces an AgentDefinition */
export type AgentFactory = () => AgentDefinition;
